import type {
  JsonSchema,
  JsonValue,
  Message,
  MessageWriter,
  PersistedState,
} from "./types.js";

export interface LineSink {
  write(chunk: string): unknown;
}

/** Writes one JSON message per line, by default to standard output. */
export class StreamMessageWriter implements MessageWriter {
  private readonly sink: LineSink;

  constructor(sink: LineSink = process.stdout) {
    this.sink = sink;
  }

  private emit(message: Message): void {
    this.sink.write(`${JSON.stringify(message)}\n`);
  }

  writeSchema(
    stream: string,
    schema: JsonSchema,
    keyProperties: readonly string[],
    bookmarkProperties?: readonly string[],
  ): void {
    this.emit({
      type: "SCHEMA",
      stream,
      schema,
      key_properties: [...keyProperties],
      ...(bookmarkProperties && bookmarkProperties.length > 0
        ? { bookmark_properties: [...bookmarkProperties] }
        : {}),
    });
  }

  writeRecord(stream: string, record: Record<string, JsonValue>): void {
    this.emit({ type: "RECORD", stream, record });
  }

  writeState(value: PersistedState): void {
    this.emit({ type: "STATE", value });
  }
}

export function createMessageWriter(sink?: LineSink): MessageWriter {
  return new StreamMessageWriter(sink);
}
