import { GoogleGenAI, type GenerateContentParameters, type GoogleGenAIOptions } from "@google/genai";
import type { GeminiConfig } from "../config";
import { ServiceNotConfiguredError, UpstreamServiceError, errorMessage } from "../errors";

const SERVICE_NAME = "Gemini";

export interface TextGenerationOptions {
  temperature?: number;
  maxOutputTokens?: number;
  json?: boolean;
}

/**
 * The one thing the itinerary generator needs from a language model.
 */
export interface TextModel {
  generateText(prompt: string, options?: TextGenerationOptions): Promise<string>;
}

// The part of GoogleGenAI this module calls
export interface ContentClient {
  models: {
    generateContent(params: GenerateContentParameters): Promise<{ text?: string }>;
  };
}

export type ContentClientFactory = (options: GoogleGenAIOptions) => ContentClient;

const createGoogleGenAI: ContentClientFactory = (options) => new GoogleGenAI(options);

// ApiError carries the HTTP status of the failed call
function isModelNotFound(error: unknown): boolean {
  return typeof error === "object" && error !== null && "status" in error && error.status === 404;
}

export class GeminiTextModel implements TextModel {
  private ai: ContentClient | null = null;
  private activeModelIndex = 0;

  constructor(
    private readonly config: GeminiConfig,
    private readonly createClient: ContentClientFactory = createGoogleGenAI,
  ) {
    if (config.models.length === 0) {
      throw new Error("At least one Gemini model name is required");
    }
  }

  isConfigured(): boolean {
    return !!this.config.apiKey || !!this.config.project;
  }

  get activeModel(): string {
    return this.config.models[this.activeModelIndex];
  }

  // Lazy initialization: API-key mode when a key is set, Vertex AI otherwise
  private getAI(): ContentClient {
    if (!this.ai) {
      if (this.config.apiKey) {
        this.ai = this.createClient({ apiKey: this.config.apiKey });
        console.log("[Gemini] ✅ Initialized with API key");
      } else if (this.config.project) {
        this.ai = this.createClient({
          vertexai: true,
          project: this.config.project,
          location: this.config.location,
          googleAuthOptions: this.config.credentialsPath ? { keyFilename: this.config.credentialsPath } : undefined,
        });
        console.log(`[Gemini] ✅ Initialized on Vertex AI (${this.config.project}/${this.config.location})`);
      } else {
        throw new ServiceNotConfiguredError(SERVICE_NAME);
      }
    }
    return this.ai;
  }

  /**
   * Tries the configured models in order, starting from the last one that
   * answered. Models the endpoint does not know are skipped.
   */
  async generateText(prompt: string, options: TextGenerationOptions = {}): Promise<string> {
    const ai = this.getAI();
    const models = this.config.models;

    for (let index = this.activeModelIndex; index < models.length; index++) {
      const model = models[index];
      const started = Date.now();
      try {
        const response = await ai.models.generateContent({
          model,
          contents: [{ role: "user", parts: [{ text: prompt }] }],
          config: {
            candidateCount: 1,
            temperature: options.temperature ?? 0.7,
            topP: 0.8,
            topK: 40,
            maxOutputTokens: options.maxOutputTokens ?? 8192,
            responseMimeType: options.json ? "application/json" : undefined,
          },
        });

        const text = response.text ?? "";
        if (!text.trim()) {
          throw new UpstreamServiceError(SERVICE_NAME, `empty response from ${model}`);
        }

        if (index !== this.activeModelIndex) {
          console.log(`[Gemini] 🔁 Switched to model ${model}`);
          this.activeModelIndex = index;
        }
        console.log(`[Gemini] 🤖 ${model} answered (${text.length} chars, ${Date.now() - started}ms)`);
        return text;
      } catch (error) {
        if (isModelNotFound(error)) {
          console.warn(`[Gemini] ⚠️ Model ${model} not available, trying next`);
          continue;
        }
        if (error instanceof UpstreamServiceError) throw error;
        throw new UpstreamServiceError(SERVICE_NAME, errorMessage(error));
      }
    }

    throw new UpstreamServiceError(SERVICE_NAME, `none of the configured models is available (${models.join(", ")})`);
  }
}
