/** Free-text completion. Output is untrusted and may be anything. */
export interface LanguageService {
  infer(prompt: string, opts?: { system?: string }): Promise<string>;
}
