import { z } from "zod";
import { UpstreamServiceError, UpstreamServiceTimeoutError } from "../core/errors.js";
import { LanguageService } from "./types.js";

const CompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1)
});

export type HttpLanguageServiceOptions = {
  apiKey: string;
  baseUrl: string; // e.g. https://api.groq.com/openai/v1
  model: string;
  timeoutMs: number;
  temperature?: number;
  maxTokens?: number;
};

/**
 * Parses model output as JSON. Models sometimes wrap the object in prose or
 * a ```json fence, so the first {...} span is tried as well.
 */
export function safeJsonParse(s: string): unknown {
  try {
    return JSON.parse(s);
  } catch {
    const m = s.match(/\{[\s\S]*\}/);
    if (!m) return null;
    try {
      return JSON.parse(m[0]);
    } catch {
      return null;
    }
  }
}

/** OpenAI-compatible chat-completions client over fetch. */
export class HttpLanguageService implements LanguageService {
  constructor(private opts: HttpLanguageServiceOptions) {}

  async infer(prompt: string, opts: { system?: string } = {}): Promise<string> {
    const url = `${this.opts.baseUrl.replace(/\/+$/, "")}/chat/completions`;
    const messages = [
      ...(opts.system ? [{ role: "system", content: opts.system }] : []),
      { role: "user", content: prompt }
    ];

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.opts.timeoutMs);

    try {
      const resp = await fetch(url, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.opts.apiKey}`,
          "Content-Type": "application/json"
        },
        body: JSON.stringify({
          model: this.opts.model,
          temperature: this.opts.temperature ?? 0,
          max_tokens: this.opts.maxTokens ?? 400,
          messages
        }),
        signal: controller.signal
      });

      if (!resp.ok) throw new UpstreamServiceError(`language service answered ${resp.status}`);

      const parsed = CompletionSchema.safeParse(await resp.json());
      if (!parsed.success) throw new UpstreamServiceError("language service returned an unexpected body", parsed.error);
      return parsed.data.choices[0].message.content ?? "";
    } catch (err) {
      if (controller.signal.aborted) throw new UpstreamServiceTimeoutError(this.opts.timeoutMs);
      if (err instanceof UpstreamServiceError) throw err;
      throw new UpstreamServiceError("language service request failed", err);
    } finally {
      clearTimeout(timer);
    }
  }
}
