import readline from 'readline/promises';

export interface Prompter {
  ask(question: string, defaultValue?: string): Promise<string>;
  confirm(question: string): Promise<boolean>;
  close(): void;
}

/**
 * 터미널 대화형 입력 (필요할 때만 readline 생성)
 */
export class ReadlinePrompter implements Prompter {
  private rl: readline.Interface | null = null;

  private get interface(): readline.Interface {
    if (!this.rl) {
      this.rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    }
    return this.rl;
  }

  async ask(question: string, defaultValue?: string): Promise<string> {
    const suffix = defaultValue ? ` [${defaultValue}]` : '';
    const answer = (await this.interface.question(`${question}${suffix}: `)).trim();
    return answer || defaultValue || '';
  }

  async confirm(question: string): Promise<boolean> {
    const answer = (await this.interface.question(`${question} (y/N): `)).trim().toLowerCase();
    return answer === 'y' || answer === 'yes';
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
  }
}
