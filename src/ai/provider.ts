/**
 * AI Provider
 * Single-turn text analysis through the Claude Agent SDK
 */

import { query } from '@anthropic-ai/claude-agent-sdk';
import { Logger } from '../utils/logger.js';

export interface AIProvider {
  analyze(prompt: string): Promise<string>;
}

export interface ClaudeProviderOptions {
  model?: string;
}

export class ClaudeAgentProvider implements AIProvider {
  private logger = new Logger('AIProvider');

  constructor(private readonly options: ClaudeProviderOptions = {}) {}

  async analyze(prompt: string): Promise<string> {
    const started = Date.now();
    const queryGenerator = query({
      prompt,
      options: {
        maxTurns: 1,
        allowedTools: [], // Plain text generation only
        ...(this.options.model ? { model: this.options.model } : {}),
      },
    });

    let resultText = '';
    for await (const message of queryGenerator) {
      if (message.type === 'result') {
        if (message.subtype !== 'success') {
          throw new Error(`AI query ended with ${message.subtype}`);
        }
        resultText = message.result;
        break;
      }
    }

    this.logger.debug(`Analysis finished in ${Date.now() - started}ms`, { chars: resultText.length });
    return resultText;
  }
}

// Singleton instance
let instance: AIProvider | null = null;

export function getAIProvider(options?: ClaudeProviderOptions): AIProvider {
  if (!instance) {
    instance = new ClaudeAgentProvider(options);
  }
  return instance;
}
