import ora, { Ora } from 'ora';

export interface SpinnerOptions {
  text: string;
  color?: 'black' | 'red' | 'green' | 'yellow' | 'blue' | 'magenta' | 'cyan' | 'white' | 'gray';
}

export class SpinnerManager {
  private spinner: Ora | null = null;
  enabled = true;

  start(options: SpinnerOptions): void {
    if (!this.enabled) return;
    if (this.spinner) {
      this.stop();
    }

    this.spinner = ora({
      text: options.text,
      color: options.color || 'cyan',
    }).start();
  }

  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }
}

export const spinner = new SpinnerManager();
