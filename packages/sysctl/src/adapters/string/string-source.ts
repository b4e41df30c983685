import type { TextSource } from "../../ports/text-source"

export class StringTextSource implements TextSource {
  constructor(
    private readonly content: string,
    readonly name: string = "string",
  ) {}

  async read(): Promise<string> {
    return this.content
  }
}
