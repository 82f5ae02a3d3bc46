import readline from 'node:readline/promises';

// ECMA-48 graphics codes, see `man console_codes`
export const COLORS = {
  default: '0',
  error: '7',
  'loading-message': '7;34',
  message: '7;35',
  title: '31',
  subtitle: '36',
  instructions: '33',
  'selection-prompt': '7;32',
  menu: '36',
  query: '7;42',
  'ai-text': '37',
  'main-prompt': '34',
  'user-text': '36',
  dice: '35',
  'print-story': '37',
} as const;

export type ColorName = keyof typeof COLORS;

export interface ConsoleIO {
  print(text: string, color?: ColorName, wrap?: boolean): void;
  ask(question: string, color?: ColorName): Promise<string>;
  bell(): void;
  /** Registers a Ctrl+C handler; the returned function removes it. */
  onInterrupt(handler: () => void): () => void;
  close(): void;
}

/** Wraps each line of `text` at `width` columns; 0 or less leaves it alone. */
export function wrapText(text: string, width: number): string {
  if (width <= 1) return text;
  return text
    .split('\n')
    .map((line) => {
      const wrapped: string[] = [];
      let current = '';
      for (const word of line.split(' ')) {
        if (current && current.length + 1 + word.length > width) {
          wrapped.push(current);
          current = word;
        } else {
          current = current ? `${current} ${word}` : word;
        }
      }
      wrapped.push(current);
      return wrapped.join('\n');
    })
    .join('\n');
}

export class TerminalConsole implements ConsoleIO {
  private readonly rl: readline.Interface;
  private interruptHandlers: Array<() => void> = [];

  constructor(private readonly wrapWidth: number, private readonly bellEnabled: boolean) {
    this.rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    this.rl.on('SIGINT', () => {
      const handler = this.interruptHandlers[this.interruptHandlers.length - 1];
      if (handler) {
        handler();
      } else {
        this.close();
        process.exit(130);
      }
    });
  }

  print(text: string, color: ColorName = 'default', wrap = true) {
    const body = wrap ? wrapText(text, this.wrapWidth) : text;
    process.stdout.write(`\x1B[${COLORS[color]}m${body}\x1B[${COLORS.default}m\n`);
  }

  async ask(question: string, color: ColorName = 'main-prompt'): Promise<string> {
    const answer = await this.rl.question(`\x1B[${COLORS[color]}m${question}\x1B[0m\x1B[${COLORS['user-text']}m`);
    process.stdout.write('\x1B[0m');
    return answer;
  }

  bell() {
    if (this.bellEnabled) process.stdout.write('\x07');
  }

  onInterrupt(handler: () => void): () => void {
    this.interruptHandlers.push(handler);
    return () => {
      this.interruptHandlers = this.interruptHandlers.filter((entry) => entry !== handler);
    };
  }

  close() {
    this.rl.close();
  }
}
