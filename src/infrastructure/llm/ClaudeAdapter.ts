import Anthropic from "@anthropic-ai/sdk";
import { DraftReply, DraftRequest, ILLMProvider } from "../../application/contracts/ILLMProvider";
import { buildReplyPrompt, REPLY_SYSTEM_PROMPT } from "./replyPrompt";

export class ClaudeAdapter implements ILLMProvider {
  readonly name = "claude";
  private client: Anthropic;

  constructor(
    apiKey: string,
    private model: string = "claude-3-5-sonnet-20240620"
  ) {
    this.client = new Anthropic({ apiKey });
  }

  async draftReply(input: DraftRequest): Promise<DraftReply> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: 200,
      system: REPLY_SYSTEM_PROMPT,
      messages: [{ role: "user", content: buildReplyPrompt(input) }]
    });

    const text = response.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("")
      .trim();

    return {
      text,
      tokensUsed: response.usage.input_tokens + response.usage.output_tokens
    };
  }
}
