import type { SynthesisPrompt } from '../../src/fusion/synthesis.js';
import type { ISynthesisProvider, SynthesisOptions } from '../../src/providers/ISynthesisProvider.js';

export class MockSynthesisProvider implements ISynthesisProvider {
  readonly prompts: SynthesisPrompt[] = [];
  public answer = 'Synthesized answer [1].';
  public error: Error | null = null;
  public hang = false;

  async generate(prompt: SynthesisPrompt, _options: SynthesisOptions): Promise<string> {
    this.prompts.push(prompt);
    if (this.hang) return new Promise<string>(() => undefined);
    if (this.error) throw this.error;
    return this.answer;
  }
}
