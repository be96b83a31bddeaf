/**
 * Immutable JSON-pointer-like path used to address nodes in the values tree
 * and in generated schemas. Rendering follows RFC 6901 (`~0`, `~1`).
 */

export type PtrSegment = string | number;

export function encodePointerSegment(segment: string): string {
  return segment.replace(/~/g, '~0').replace(/\//g, '~1');
}

export function decodePointerSegment(segment: string): string {
  return segment.replace(/~1/g, '/').replace(/~0/g, '~');
}

export class Ptr {
  static readonly root = new Ptr([]);

  private constructor(private readonly segments: readonly string[]) {}

  static of(...segments: PtrSegment[]): Ptr {
    return new Ptr(segments.map(String));
  }

  /** Parses the rendered form; `""` and `"/"` are both the root. */
  static parse(text: string): Ptr {
    const trimmed = text.startsWith('#') ? text.slice(1) : text;
    if (trimmed === '' || trimmed === '/') {
      return Ptr.root;
    }
    const body = trimmed.startsWith('/') ? trimmed.slice(1) : trimmed;
    return new Ptr(body.split('/').map(decodePointerSegment));
  }

  get length(): number {
    return this.segments.length;
  }

  get parts(): readonly string[] {
    return this.segments;
  }

  prop(...names: string[]): Ptr {
    return new Ptr([...this.segments, ...names]);
  }

  item(...indexes: number[]): Ptr {
    return new Ptr([...this.segments, ...indexes.map(String)]);
  }

  concat(other: Ptr): Ptr {
    return new Ptr([...this.segments, ...other.segments]);
  }

  hasPrefix(prefix: Ptr): boolean {
    if (prefix.segments.length > this.segments.length) {
      return false;
    }
    return prefix.segments.every((seg, i) => this.segments[i] === seg);
  }

  equals(other: Ptr): boolean {
    return (
      other.segments.length === this.segments.length && this.hasPrefix(other)
    );
  }

  toString(): string {
    if (this.segments.length === 0) {
      return '/';
    }
    return '/' + this.segments.map(encodePointerSegment).join('/');
  }
}
