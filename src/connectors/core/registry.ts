import type { Stream, StreamDefinition } from "./types.js";

/**
 * Ordered set of extractable streams. Iteration order is the default sync
 * order, and a child may only be registered after its parent.
 */
export class StreamRegistry<S> {
  private readonly streams = new Map<string, Stream<S>>();

  constructor(streams: Iterable<Stream<S>> = []) {
    for (const stream of streams) {
      this.register(stream);
    }
  }

  register(stream: Stream<S>): this {
    if (this.streams.has(stream.id)) {
      throw new Error(`Stream "${stream.id}" is already registered`);
    }
    if (stream.parent !== undefined && !this.streams.has(stream.parent)) {
      throw new Error(
        `Stream "${stream.id}" must be registered after its parent "${stream.parent}"`,
      );
    }
    this.streams.set(stream.id, stream);
    return this;
  }

  has(id: string): boolean {
    return this.streams.has(id);
  }

  get(id: string): Stream<S> {
    const stream = this.streams.get(id);
    if (!stream) {
      throw new Error(
        `Stream "${id}" not found. Available: ${this.ids().join(", ")}`,
      );
    }
    return stream;
  }

  ids(): string[] {
    return [...this.streams.keys()];
  }

  list(): Stream<S>[] {
    return [...this.streams.values()];
  }

  definitions(): StreamDefinition[] {
    return this.list();
  }
}
