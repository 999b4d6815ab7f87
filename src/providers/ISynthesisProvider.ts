import type { SynthesisPrompt } from '../fusion/synthesis.js';

export interface SynthesisOptions {
  signal?: AbortSignal;
  maxWords: number;
}

/** Text generation for the optional narrative answer. */
export interface ISynthesisProvider {
  generate(prompt: SynthesisPrompt, options: SynthesisOptions): Promise<string>;
}
