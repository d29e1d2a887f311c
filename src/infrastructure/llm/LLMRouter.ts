import { DraftReply, DraftRequest, ILLMProvider } from "../../application/contracts/ILLMProvider";
import { componentLogger } from "../logging/logger";

const log = componentLogger("LLMRouter");

/** Tries each provider in order and returns the first usable draft. */
export class LLMRouter implements ILLMProvider {
  readonly name = "router";

  constructor(private providers: ILLMProvider[]) {
    if (providers.length === 0) {
      throw new Error("LLMRouter needs at least one provider");
    }
  }

  async draftReply(input: DraftRequest): Promise<DraftReply> {
    let lastError: unknown;

    for (const provider of this.providers) {
      try {
        const reply = await provider.draftReply(input);
        if (reply.text) return reply;
        log.warn({ provider: provider.name }, "Provider returned an empty draft, trying next");
      } catch (error) {
        lastError = error;
        log.warn({ err: error, provider: provider.name }, "Provider failed, trying next");
      }
    }

    throw lastError instanceof Error ? lastError : new Error("No provider produced a draft");
  }
}
