export const ANTHROPIC_MODEL_ALIASES = [
    "claude-opus-4-5",
    "claude-sonnet-4-5",
    "claude-haiku-4-5",
] as const;

export type AnthropicModelAlias = typeof ANTHROPIC_MODEL_ALIASES[number];

export type ImageMediaType = "image/png" | "image/jpeg";

export interface ModelImage {
    mediaType: ImageMediaType;
    base64Data: string;
}

export interface ModelRequest {
    systemPrompt: string;
    userPrompt: string;
    image?: ModelImage;
}

/**
 * The language-model capability the healer depends on: a prompt (and an
 * optional screenshot) in, the model's text out. Resolves to undefined when
 * the backend could not produce a response.
 */
export interface ModelBackend {
    complete(request: ModelRequest): Promise<string | undefined>;
}

export interface TokenUsage {
    inputTokens: number;
    outputTokens: number;
    cacheCreationInputTokens: number;
    cacheReadInputTokens: number;
}

interface ModelPricing {
    inputPerMillion: number;
    outputPerMillion: number;
    cacheWritePerMillion: number;
    cacheReadPerMillion: number;
}

export interface CostEstimate {
    inputCost: number;
    outputCost: number;
    cacheWriteCost: number;
    cacheReadCost: number;
    totalCost: number;
}

// Pricing source: https://platform.claude.com/docs/en/about-claude/pricing
// Cache write: 1.25x base input price, Cache read: 0.1x base input price
export const MODEL_PRICING: Record<AnthropicModelAlias, ModelPricing> = {
    'claude-opus-4-5': {
        inputPerMillion: 5.00,
        outputPerMillion: 25.00,
        cacheWritePerMillion: 6.25,
        cacheReadPerMillion: 0.50,
    },
    'claude-sonnet-4-5': {
        inputPerMillion: 3.00,
        outputPerMillion: 15.00,
        cacheWritePerMillion: 3.75,
        cacheReadPerMillion: 0.30,
    },
    'claude-haiku-4-5': {
        inputPerMillion: 1.00,
        outputPerMillion: 5.00,
        cacheWritePerMillion: 1.25,
        cacheReadPerMillion: 0.10,
    },
};

export const estimateCost = (model: AnthropicModelAlias, usage: TokenUsage): CostEstimate => {
    const pricing = MODEL_PRICING[model];
    const inputCost = usage.inputTokens * pricing.inputPerMillion / 1_000_000;
    const outputCost = usage.outputTokens * pricing.outputPerMillion / 1_000_000;
    const cacheWriteCost = usage.cacheCreationInputTokens * pricing.cacheWritePerMillion / 1_000_000;
    const cacheReadCost = usage.cacheReadInputTokens * pricing.cacheReadPerMillion / 1_000_000;
    return {
        inputCost,
        outputCost,
        cacheWriteCost,
        cacheReadCost,
        totalCost: inputCost + outputCost + cacheWriteCost + cacheReadCost,
    };
};

export interface ApiLogEntry {
  timestamp: string;
  request: unknown;
  response: unknown;
  durationMs?: number;
  success: boolean;
  error?: string;
  usage?: TokenUsage;
  costEstimate?: CostEstimate;
}
