/* eslint-disable @typescript-eslint/no-unsafe-declaration-merging */
import { EventEmitter } from 'events';
import { isPrompt } from './debuggerOutputParser';

const PROMPT_AT_START = /^\s*DB<+\d+>+\s?/;

export interface LineChannelEvents {
  line: (line: string) => void;
  /** The debugger is waiting for a command. */
  prompt: () => void;
}

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export declare interface LineChannel {
  on<U extends keyof LineChannelEvents>(
    event: U,
    listener: LineChannelEvents[U],
  ): this;
  emit<U extends keyof LineChannelEvents>(
    event: U,
    ...args: Parameters<LineChannelEvents[U]>
  ): boolean;
}

/**
 * Splits debugger output into lines. The prompt is written without a newline,
 * so the unterminated tail is checked for it after every chunk; a prompt glued
 * to the start of the next line is split off.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class LineChannel extends EventEmitter {
  private partial = '';

  push(chunk: string): void {
    this.partial += chunk;
    let newline = this.partial.indexOf('\n');
    while (newline !== -1) {
      const line = this.partial.slice(0, newline).replace(/\r$/, '');
      this.partial = this.partial.slice(newline + 1);
      this.emitLine(line);
      newline = this.partial.indexOf('\n');
    }
    if (isPrompt(this.partial)) {
      this.partial = '';
      this.emit('prompt');
    }
  }

  /** Emits whatever is left once the stream has ended. */
  end(): void {
    if (this.partial.length > 0) {
      const rest = this.partial;
      this.partial = '';
      this.emitLine(rest);
    }
  }

  private emitLine(line: string): void {
    if (isPrompt(line)) {
      this.emit('prompt');
      return;
    }
    const prompt = PROMPT_AT_START.exec(line);
    if (prompt) {
      this.emit('prompt');
      this.emit('line', line.slice(prompt[0].length));
      return;
    }
    this.emit('line', line);
  }
}
