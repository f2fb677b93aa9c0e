export interface LLMClient {
  generate(systemPrompt: string, userPrompt: string): Promise<string>;
}
