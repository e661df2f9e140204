import ora, { type Ora } from 'ora';

/**
 * Spinner shown while the agent waits on the oracle or a tool.
 * `pause` clears it so log lines print cleanly, `resume` brings it back.
 */
export interface ProgressSpinner {
  update(text: string): void;
  pause(): void;
  resume(): void;
  finish(success: boolean, text: string): void;
}

export function createSpinner(text: string): Ora {
  return ora({
    text,
    spinner: 'dots',
  });
}

/**
 * Create a spinner that stays silent when output is not a terminal or
 * when `enabled` is false
 */
export function createProgressSpinner(
  text: string,
  enabled: boolean = true
): ProgressSpinner {
  const spinner = createSpinner(text);
  const active = enabled && Boolean(process.stdout.isTTY);

  if (active) {
    spinner.start();
  }

  return {
    update(next: string) {
      spinner.text = next;
    },
    pause() {
      if (active) {
        spinner.stop();
      }
    },
    resume() {
      if (active) {
        spinner.start();
      }
    },
    finish(success: boolean, finalText: string) {
      if (!active) {
        return;
      }
      if (success) {
        spinner.succeed(finalText);
      } else {
        spinner.fail(finalText);
      }
    },
  };
}
