export type SummaryExtractionConfig = {
  // Per-extractor cap, one stalled kind never blocks the others
  extractorTimeoutMs: number;
  promptsDirectory: string;
  llm: {
    baseUrl: string; // OpenAI-compatible, e.g. https://api.openai.com/v1
    apiKey?: string;
    model: string;
    temperature: number;
    maxRetries: number;
    retryDelayMs: number; // Doubles on each retry
  };
};
