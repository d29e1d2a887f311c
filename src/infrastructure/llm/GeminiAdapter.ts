import { GoogleGenerativeAI } from "@google/generative-ai";
import { DraftReply, DraftRequest, ILLMProvider } from "../../application/contracts/ILLMProvider";
import { buildReplyPrompt, REPLY_SYSTEM_PROMPT } from "./replyPrompt";

export class GeminiAdapter implements ILLMProvider {
  readonly name: string;
  private genAI: GoogleGenerativeAI;

  constructor(
    apiKey: string,
    private modelName: string = "gemini-1.5-flash"
  ) {
    this.genAI = new GoogleGenerativeAI(apiKey);
    this.name = `gemini:${modelName}`;
  }

  async draftReply(input: DraftRequest): Promise<DraftReply> {
    const model = this.genAI.getGenerativeModel({
      model: this.modelName,
      systemInstruction: REPLY_SYSTEM_PROMPT
    });

    const result = await model.generateContent(buildReplyPrompt(input));
    return {
      text: result.response.text().trim(),
      tokensUsed: result.response.usageMetadata?.totalTokenCount || 0
    };
  }
}
