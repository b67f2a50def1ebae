import OpenAI from 'openai';
import { WRITER_CONFIG } from '../config/writer';

let cachedClient: OpenAI | null = null;

export function getOpenAI(): OpenAI {
  if (cachedClient) {
    return cachedClient;
  }

  const apiKey = process.env.OPENAI_API_KEY?.trim();
  if (!apiKey) {
    throw new Error('Missing OPENAI_API_KEY environment variable');
  }

  cachedClient = new OpenAI({
    apiKey,
    // Retries are owned by the generation gateway's policy.
    maxRetries: 0,
  });

  return cachedClient;
}

export type CompletionParams = {
  prompt: string;
  maxTokens: number;
  temperature: number;
};

/** The text-generation capability: one prompt in, generated text out, or a thrown error. */
export interface TextGenerator {
  complete(params: CompletionParams): Promise<string>;
}

export function createOpenAITextGenerator(model: string = WRITER_CONFIG.MODEL): TextGenerator {
  return {
    async complete({ prompt, maxTokens, temperature }) {
      const openai = getOpenAI();
      const response = await openai.chat.completions.create({
        model,
        messages: [{ role: 'user', content: prompt }],
        temperature,
        max_tokens: maxTokens,
      });
      return response.choices[0]?.message?.content ?? '';
    },
  };
}
