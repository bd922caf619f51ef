/**
 * Config keys - dot-separated paths into a nested configuration object
 */

export class Key {
  static readonly root = new Key([]);

  constructor(readonly segments: readonly string[]) {}

  static parse(key: string): Key {
    return key === '' ? Key.root : new Key(key.split('.'));
  }

  static of(key: Key | string): Key {
    return typeof key === 'string' ? Key.parse(key) : key;
  }

  get isRoot(): boolean {
    return this.segments.length === 0;
  }

  get parent(): Key {
    return new Key(this.segments.slice(0, -1));
  }

  get local(): string {
    return this.segments[this.segments.length - 1] ?? '';
  }

  child(segment: string | Key): Key {
    return new Key([...this.segments, ...Key.of(segment).segments]);
  }

  toString(): string {
    return this.isRoot ? '<RootKey>' : this.segments.join('.');
  }
}
