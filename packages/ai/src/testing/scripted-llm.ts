/**
 * Scripted LLM client for tests
 *
 * Replies are consumed in order. An Error reply is thrown instead of
 * returned; a function reply sees the prompt.
 */

import type { GenerateOptions, LLMClient } from '../gemini-client.js';

export type ScriptedReply = string | Error | ((prompt: string) => string | Error);

export interface RecordedCall {
  prompt: string;
  options: GenerateOptions;
}

export class ScriptedLLM implements LLMClient {
  readonly calls: RecordedCall[] = [];
  private readonly replies: ScriptedReply[];

  constructor(replies: ScriptedReply[] = []) {
    this.replies = [...replies];
  }

  /** Queue more replies */
  push(...replies: ScriptedReply[]): this {
    this.replies.push(...replies);
    return this;
  }

  get remaining(): number {
    return this.replies.length;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    this.calls.push({ prompt, options });
    const next = this.replies.shift();
    if (next === undefined) {
      throw new Error(`ScriptedLLM has no reply left for call ${this.calls.length}`);
    }
    const reply = typeof next === 'function' ? next(prompt) : next;
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}
