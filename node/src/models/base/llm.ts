import type { GenerateTextInput, GenerateTextOutput } from '../types';

abstract class BaseLLM<CONFIG> {
  constructor(protected config: CONFIG) {}

  /**
   * Generate text from messages. Implementations must honour `input.signal`.
   */
  abstract generateText(input: GenerateTextInput): Promise<GenerateTextOutput>;
}

export default BaseLLM;
