import { buffer } from "node:stream/consumers"
import { SourceReadError } from "../../core/errors"
import { decodeUtf8 } from "../../core/text/decode-utf8"
import type { TextSource } from "../../ports/text-source"

/**
 * Drains a readable stream, standard input by default, as UTF-8 text.
 * Bytes that are not valid UTF-8 fail the read.
 *
 * A stream can only be consumed once; a second read() resolves to whatever
 * the stream still has, usually nothing.
 */
export class StreamTextSource implements TextSource {
  constructor(
    private readonly stream: NodeJS.ReadableStream = process.stdin,
    readonly name: string = "stdin",
  ) {}

  async read(): Promise<string> {
    try {
      return decodeUtf8(await buffer(this.stream))
    } catch (err) {
      throw new SourceReadError(this.name, err)
    }
  }
}
