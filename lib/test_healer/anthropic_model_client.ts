import Anthropic from "@anthropic-ai/sdk";
import {writeFileSync, mkdirSync} from "fs";
import {join} from "path";
import {
    AnthropicModelAlias,
    ApiLogEntry,
    estimateCost,
    ModelBackend,
    ModelRequest,
    TokenUsage,
} from "@lib/test_healer/model_client.types";
import {formatErrorMessage} from "@lib/test_healer/utils";

export interface MessagesApi {
    create(params: Anthropic.Messages.MessageCreateParamsNonStreaming): Promise<Anthropic.Messages.Message>;
}

/**
 * Single-shot Anthropic Messages client. Every call, successful or not, is
 * written to the run log directory as `<n>_claude_api.json`.
 */
export class AnthropicModelClient implements ModelBackend {
    private apiCallCount = 0;

    constructor(
        private runLogDir: string,
        private model: AnthropicModelAlias,
        private messagesApi: MessagesApi,
        private maxTokens = 4096,
    ) {
        mkdirSync(this.runLogDir, {recursive: true});
    }

    complete = async (request: ModelRequest): Promise<string | undefined> => {
        const content: Anthropic.Messages.ContentBlockParam[] = [];
        if (request.image) {
            content.push({
                type: "image",
                source: {
                    type: "base64",
                    media_type: request.image.mediaType,
                    data: request.image.base64Data,
                },
            });
        }
        content.push({type: "text", text: request.userPrompt});

        const params: Anthropic.Messages.MessageCreateParamsNonStreaming = {
            model: this.model,
            max_tokens: this.maxTokens,
            temperature: 0.1,
            system: request.systemPrompt,
            messages: [{role: "user", content}],
        };

        const timestamp = new Date();
        let response: Anthropic.Messages.Message | undefined;
        let error: string | undefined;
        try {
            response = await this.messagesApi.create(params);
            return this.extractTextContent(response);
        } catch (e) {
            error = formatErrorMessage(e);
            console.log(`   ❌ Model API error: ${error}`);
            return undefined;
        } finally {
            const usage = response ? this.extractUsage(response) : undefined;
            this.writeApiLog({
                timestamp: timestamp.toISOString(),
                durationMs: Date.now() - timestamp.getTime(),
                // the screenshot payload is large and already on disk
                request: {...params, messages: request.image ? "[message with screenshot omitted]" : params.messages},
                response,
                success: response != null,
                error,
                usage,
                costEstimate: usage ? estimateCost(this.model, usage) : undefined,
            });
            this.apiCallCount += 1;
        }
    };

    private extractTextContent = (response: Anthropic.Messages.Message): string => {
        let textContent = "";
        for (const block of response.content) {
            if (block.type === "text") {
                textContent += block.text;
            }
        }
        return textContent;
    };

    private extractUsage = (response: Anthropic.Messages.Message): TokenUsage => ({
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        cacheCreationInputTokens: response.usage.cache_creation_input_tokens ?? 0,
        cacheReadInputTokens: response.usage.cache_read_input_tokens ?? 0,
    });

    private writeApiLog = (entry: ApiLogEntry): void => {
        const logPath = join(this.runLogDir, `${this.apiCallCount}_claude_api.json`);
        writeFileSync(logPath, JSON.stringify(entry, null, 2));
    };
}

export const anthropicModelClientFactory = (
    runLogDir: string,
    model: AnthropicModelAlias,
) => {
    const anthropic = new Anthropic();
    return new AnthropicModelClient(runLogDir, model, anthropic.messages);
}
