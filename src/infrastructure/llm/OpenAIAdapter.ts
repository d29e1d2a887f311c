import OpenAI from "openai";
import { DraftReply, DraftRequest, ILLMProvider } from "../../application/contracts/ILLMProvider";
import { buildReplyPrompt, REPLY_SYSTEM_PROMPT } from "./replyPrompt";

export class OpenAIAdapter implements ILLMProvider {
  readonly name = "openai";
  private client: OpenAI;

  constructor(
    apiKey: string,
    private model: string = "gpt-4o-mini"
  ) {
    this.client = new OpenAI({ apiKey });
  }

  async draftReply(input: DraftRequest): Promise<DraftReply> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        { role: "system", content: REPLY_SYSTEM_PROMPT },
        { role: "user", content: buildReplyPrompt(input) }
      ],
      temperature: 0.4,
      max_tokens: 200
    });

    return {
      text: response.choices[0]?.message.content?.trim() || "",
      tokensUsed: response.usage?.total_tokens || 0
    };
  }
}
