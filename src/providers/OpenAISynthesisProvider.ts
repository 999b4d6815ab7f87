/**
 * Narrative synthesis through an OpenAI chat model.
 */

import OpenAI from 'openai';
import type { SynthesisPrompt } from '../fusion/synthesis.js';
import type { ISynthesisProvider, SynthesisOptions } from './ISynthesisProvider.js';

const DEFAULT_MODEL = 'gpt-4o-mini';

/** Rough tokens-per-word allowance for the completion budget. */
const TOKENS_PER_WORD = 2;

export class OpenAISynthesisProvider implements ISynthesisProvider {
  private client: OpenAI;
  private model: string;

  constructor(opts?: { apiKey?: string; model?: string; client?: OpenAI }) {
    this.client =
      opts?.client ??
      new OpenAI({
        apiKey: opts?.apiKey ?? process.env.OPENAI_API_KEY,
      });
    this.model = opts?.model ?? DEFAULT_MODEL;
  }

  async generate(prompt: SynthesisPrompt, options: SynthesisOptions): Promise<string> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        temperature: 0,
        max_tokens: options.maxWords * TOKENS_PER_WORD,
        messages: [
          { role: 'system', content: prompt.system },
          { role: 'user', content: prompt.user },
        ],
      },
      { signal: options.signal }
    );

    const content = completion.choices[0]?.message?.content?.trim();
    if (!content) {
      throw new Error('Synthesis model returned no content');
    }
    return content;
  }
}
