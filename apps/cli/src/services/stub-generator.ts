import type { GenerationRequest, RawResponse } from "@filesmith/shared";
import type { FileGenerator, GenerateOptions } from "./generator.js";

/**
 * StubGenerator answers every request with a canned response text and keeps
 * the requests it saw. Stands in for a remote model where no network is wanted.
 */
export class StubGenerator implements FileGenerator {
  readonly provider = "stub";
  readonly model = "stub";
  readonly requests: GenerationRequest[] = [];

  constructor(private readonly reply: string | Error) {}

  async generate(request: GenerationRequest, _options?: GenerateOptions): Promise<RawResponse> {
    this.requests.push(request);
    if (this.reply instanceof Error) throw this.reply;
    return { text: this.reply, raw: { text: this.reply } };
  }
}
