import { createLogger } from '../utils/logger';
import type { BufferedFeed } from './feed';
import type { PriceSample } from './types';

const log = createLogger('replay');

/**
 * Feeds recorded samples into a BufferedFeed one at a time on a timer, so the
 * engine sees them arrive as if live and the optimizer never sees ahead.
 */
export class ReplaySource {
  private readonly pending: PriceSample[];
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly feed: BufferedFeed,
    samples: readonly PriceSample[],
    private readonly intervalMs: number,
  ) {
    this.pending = [...samples];
  }

  get remaining(): number {
    return this.pending.length;
  }

  /** Push the next sample now. Returns false once the recording is exhausted. */
  pushNext(): boolean {
    const next = this.pending.shift();
    if (!next) return false;
    this.feed.push(next);
    return true;
  }

  start() {
    if (this.timer) return;
    this.timer = setInterval(() => {
      if (!this.pushNext()) {
        log.info('Replay exhausted');
        this.stop();
      }
    }, this.intervalMs);
  }

  stop() {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }
}
