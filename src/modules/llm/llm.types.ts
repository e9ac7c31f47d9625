export interface CompletionRequest {
  prompt: string;
  systemPrompt?: string;
}
