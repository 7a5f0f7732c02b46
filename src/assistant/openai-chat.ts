import OpenAI from "openai";
import { UnmangleConfig } from "../config";
import { UnmangleError } from "../errors";
import { ChatCompletion } from "./chat-assistant";

/** A ChatCompletion backed by the OpenAI chat completions API */
export function createOpenAIChat(
  config: Pick<UnmangleConfig, "apiKey" | "model" | "temperature">,
  client: OpenAI = new OpenAI({ apiKey: config.apiKey, maxRetries: 0 })
): ChatCompletion {
  return async (prompt, maxTokens) => {
    const response = await client.chat.completions.create({
      model: config.model,
      messages: [{ role: "user", content: prompt }],
      max_tokens: maxTokens,
      temperature: config.temperature,
    });
    const content = response.choices[0]?.message.content;
    if (content == null) {
      throw new UnmangleError(`${config.model} returned an empty response`);
    }
    return content;
  };
}
