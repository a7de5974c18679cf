import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { logWarn, serializeError } from "./logging.js";

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface TransformerRequest {
  messages: ChatMessage[];
  model?: string;
  signal?: AbortSignal;
}

export type TransformerResult = { ok: true; text: string } | { ok: false; reason: string };

export interface ProviderDescriptor {
  id: string;
  name: string;
  defaultModel: string;
  configured: boolean;
}

export interface Transformer {
  descriptor: ProviderDescriptor;
  generate(request: TransformerRequest): Promise<TransformerResult>;
}

export const mockVerdictText = JSON.stringify({
  violation: false,
  reason: "mock provider performed no analysis",
  fix: ""
});

export class MockTransformer implements Transformer {
  descriptor: ProviderDescriptor = {
    id: "mock",
    name: "Mock Provider",
    defaultModel: "mock-v1",
    configured: true
  };

  async generate(request: TransformerRequest): Promise<TransformerResult> {
    if (request.signal?.aborted) {
      return { ok: false, reason: "request aborted" };
    }
    return { ok: true, text: mockVerdictText };
  }
}

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z.union([z.string(), z.array(z.object({ text: z.string().optional() }).passthrough()), z.null()]).optional()
          })
          .optional()
      })
    )
    .default([])
});

function completionText(content: string | Array<{ text?: string }> | null | undefined): string {
  if (typeof content === "string") {
    return content;
  }
  if (Array.isArray(content)) {
    return content.map((part) => part.text ?? "").join("\n");
  }
  return "";
}

/**
 * Aborts when either the caller's signal or the request deadline fires.
 * Returns a release function that detaches the caller listener.
 */
function linkSignals(timeoutMs: number, outer?: AbortSignal): { signal: AbortSignal; release: () => void } {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new Error(`request timed out after ${timeoutMs}ms`)), timeoutMs);
  const onAbort = (): void => controller.abort(outer?.reason);

  if (outer) {
    if (outer.aborted) {
      controller.abort(outer.reason);
    } else {
      outer.addEventListener("abort", onAbort, { once: true });
    }
  }

  return {
    signal: controller.signal,
    release: () => {
      clearTimeout(timer);
      outer?.removeEventListener("abort", onAbort);
    }
  };
}

export class OpenAiCompatibleTransformer implements Transformer {
  descriptor: ProviderDescriptor;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly requestTimeoutMs: number;

  constructor(descriptor: ProviderDescriptor, apiKey: string, baseUrl: string, requestTimeoutMs = 90_000) {
    this.descriptor = descriptor;
    this.apiKey = apiKey;
    this.baseUrl = baseUrl.replace(/\/$/, "");
    this.requestTimeoutMs = requestTimeoutMs;
  }

  async generate(request: TransformerRequest): Promise<TransformerResult> {
    const { signal, release } = linkSignals(this.requestTimeoutMs, request.signal);

    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`
        },
        body: JSON.stringify({
          model: request.model || this.descriptor.defaultModel,
          temperature: 0.2,
          response_format: { type: "json_object" },
          messages: request.messages
        }),
        signal
      });

      if (!response.ok) {
        const details = await response.text();
        return { ok: false, reason: `provider request failed (${response.status}): ${details.slice(0, 500)}` };
      }

      const payload = completionSchema.safeParse(await response.json());
      if (!payload.success) {
        return { ok: false, reason: "provider returned an unexpected completion payload" };
      }

      const text = completionText(payload.data.choices[0]?.message?.content);
      if (!text.trim()) {
        return { ok: false, reason: "provider returned an empty completion" };
      }

      return { ok: true, text };
    } catch (error) {
      logWarn("transformer_request_failed", { provider: this.descriptor.id, error: serializeError(error) });
      return {
        ok: false,
        reason: signal.aborted ? "provider request aborted or timed out" : `provider request failed: ${String(error)}`
      };
    } finally {
      release();
    }
  }
}

export interface ProviderRegistryOptions {
  env?: NodeJS.ProcessEnv;
  requestTimeoutMs?: number;
}

export class ProviderRegistry {
  private readonly providers = new Map<string, Transformer>();
  private readonly defaultProviderId: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: ProviderRegistryOptions = {}) {
    this.env = options.env ?? process.env;
    const env = this.env;
    this.providers.set("mock", new MockTransformer());

    const openAiKey = env.OPENAI_API_KEY;
    const openAiModel = env.OPENAI_MODEL || "gpt-4.1-mini";
    if (openAiKey) {
      this.providers.set(
        "openai",
        new OpenAiCompatibleTransformer(
          {
            id: "openai",
            name: "OpenAI",
            defaultModel: openAiModel,
            configured: true
          },
          openAiKey,
          env.OPENAI_BASE_URL || "https://api.openai.com/v1",
          options.requestTimeoutMs
        )
      );
    }

    const openRouterKey = env.OPENROUTER_API_KEY;
    const openRouterModel = env.OPENROUTER_MODEL || "openai/gpt-4.1-mini";
    if (openRouterKey) {
      this.providers.set(
        "openrouter",
        new OpenAiCompatibleTransformer(
          {
            id: "openrouter",
            name: "OpenRouter",
            defaultModel: openRouterModel,
            configured: true
          },
          openRouterKey,
          env.OPENROUTER_BASE_URL || "https://openrouter.ai/api/v1",
          options.requestTimeoutMs
        )
      );
    }

    this.defaultProviderId = this.resolveDefaultProviderId();
  }

  private resolveDefaultProviderId(): string {
    const configuredDefault = String(this.env.ARCH_REPAIR_DEFAULT_PROVIDER || "").trim();
    if (configuredDefault) {
      if (!this.providers.has(configuredDefault)) {
        throw new ConfigurationError(
          `ARCH_REPAIR_DEFAULT_PROVIDER is set to '${configuredDefault}', but that provider is not configured.`
        );
      }
      return configuredDefault;
    }

    const firstConfiguredRealProvider = Array.from(this.providers.values())
      .map((provider) => provider.descriptor)
      .find((descriptor) => descriptor.id !== "mock" && descriptor.configured);

    return firstConfiguredRealProvider?.id || "mock";
  }

  list(): ProviderDescriptor[] {
    return Array.from(this.providers.values())
      .sort((left, right) => {
        const leftDefault = left.descriptor.id === this.defaultProviderId ? 0 : 1;
        const rightDefault = right.descriptor.id === this.defaultProviderId ? 0 : 1;
        if (leftDefault !== rightDefault) {
          return leftDefault - rightDefault;
        }
        return left.descriptor.id.localeCompare(right.descriptor.id);
      })
      .map((provider) => provider.descriptor);
  }

  getDefaultProviderId(): string {
    return this.defaultProviderId;
  }

  resolveProviderId(providerId: string | undefined | null): string {
    const resolved = typeof providerId === "string" && providerId.trim().length > 0 ? providerId.trim() : this.defaultProviderId;
    if (!this.providers.has(resolved)) {
      throw new ConfigurationError(`Unknown provider: ${resolved}`);
    }
    return resolved;
  }

  get(providerId?: string | null): Transformer {
    const provider = this.providers.get(this.resolveProviderId(providerId));
    if (!provider) {
      throw new Error(`Unknown provider: ${String(providerId)}`);
    }
    return provider;
  }
}
