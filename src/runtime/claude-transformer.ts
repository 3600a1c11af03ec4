/**
 * ClaudeTransformer - translates fuse snippets between languages with the
 * Anthropic Claude API. Used by `optimize` when the configured transformer
 * provider is "claude".
 */

import Anthropic from '@anthropic-ai/sdk';
import { CodeTransformer } from './transform';

export interface ClaudeTransformerOptions {
  /** Anthropic API key. Falls back to ANTHROPIC_API_KEY env var. */
  apiKey?: string;
  /** Defaults to claude-sonnet-4-5-20250929. */
  model?: string;
  /** Defaults to 4096. */
  maxTokens?: number;
}

export const NO_MAPPING = 'NO_MAPPING';

const SYSTEM_PROMPT = `You translate small programs between programming languages.
Translate the user's program into the requested target language so that it prints exactly the same output.
The result must be a complete program that compiles and runs on its own.
Return ONLY the translated source code, with no explanation.
If the program cannot be translated faithfully, reply with exactly ${NO_MAPPING}.`;

/** Remove a surrounding ``` fence (with or without a language tag). */
export function stripCodeFence(text: string): string {
  const match = text.trim().match(/^```[\w+#-]*\s*\n([\s\S]*?)\n?```$/);
  return match ? match[1] : text.trim();
}

export class ClaudeTransformer implements CodeTransformer {
  private client: Anthropic;
  private model: string;
  private maxTokens: number;

  constructor(options: ClaudeTransformerOptions = {}) {
    this.client = new Anthropic({
      apiKey: options.apiKey || process.env.ANTHROPIC_API_KEY,
    });
    this.model = options.model || 'claude-sonnet-4-5-20250929';
    this.maxTokens = options.maxTokens || 4096;
  }

  async translate(sourceLanguage: string, targetLanguage: string, code: string): Promise<string | null> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: this.maxTokens,
      temperature: 0,
      system: SYSTEM_PROMPT,
      messages: [{
        role: 'user',
        content: `Translate this ${sourceLanguage} program to ${targetLanguage}:\n\n${code}`,
      }],
    });

    if (response.stop_reason === 'max_tokens') {
      console.warn(`[warn] Translation truncated at ${this.maxTokens} tokens; keeping the original ${sourceLanguage} snippet.`);
      return null;
    }

    const textBlock = response.content.find(block => block.type === 'text');
    const text = textBlock && textBlock.type === 'text' ? textBlock.text.trim() : '';
    if (text === '' || text === NO_MAPPING) return null;

    const translated = stripCodeFence(text);
    return translated.endsWith('\n') ? translated : translated + '\n';
  }
}
