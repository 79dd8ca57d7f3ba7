/**
 * Lightweight CLI spinner for waits on the AdminService.
 * Draws on stderr, and only when stderr is a terminal.
 */

const FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
const INTERVAL_MS = 80;

export interface Spinner {
  /** Stop and clear the spinner line */
  stop(): void;
  /** Stop and replace with a final message */
  succeed(message: string): void;
  /** Stop and replace with an error message */
  fail(message: string): void;
}

/**
 * Start an animated spinner with the given message.
 *
 * ```ts
 * const spin = startSpinner('Fetching distribution points…');
 * const nodes = await client.listDistributionPoints();
 * spin.succeed(`Found ${nodes.length} distribution point(s)`);
 * ```
 */
export function startSpinner(message: string, stream: NodeJS.WriteStream = process.stderr): Spinner {
  const interactive = stream.isTTY === true;
  let frameIndex = 0;
  let stopped = false;
  let timer: ReturnType<typeof setInterval> | undefined;

  const clear = (): void => {
    if (stopped) return;
    stopped = true;
    if (timer) clearInterval(timer);
    if (interactive) {
      stream.write('\r\x1b[K\x1b[?25h');
    }
    process.removeListener('exit', clear);
  };

  if (interactive) {
    stream.write('\x1b[?25l');
    timer = setInterval(() => {
      const frame = FRAMES[frameIndex % FRAMES.length];
      stream.write(`\r\x1b[K\x1b[36m${frame}\x1b[0m ${message}`);
      frameIndex++;
    }, INTERVAL_MS);
    // Restore the cursor if the process exits mid-spin
    process.on('exit', clear);
  }

  return {
    stop() {
      clear();
    },
    succeed(msg: string) {
      clear();
      stream.write(interactive ? `\x1b[32m✔\x1b[0m ${msg}\n` : `✔ ${msg}\n`);
    },
    fail(msg: string) {
      clear();
      stream.write(interactive ? `\x1b[31m✖\x1b[0m ${msg}\n` : `✖ ${msg}\n`);
    },
  };
}
