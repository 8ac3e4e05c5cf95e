/**
 * Spinner wrapper that respects quiet/JSON mode.
 */

import ora, { type Ora } from "ora";
import { isQuietMode, isJsonMode } from "./cli-context.js";

export interface Spinner {
  start(text?: string): Spinner;
  stop(): Spinner;
  isSpinning: boolean;
}

/**
 * No-op spinner for quiet/JSON mode and tests.
 */
export class SilentSpinner implements Spinner {
  isSpinning = false;

  start(_text?: string): Spinner {
    this.isSpinning = true;
    return this;
  }

  stop(): Spinner {
    this.isSpinning = false;
    return this;
  }
}

/**
 * Wrapper around ora. Spins on stderr so stdout stays clean.
 */
class OraSpinner implements Spinner {
  private ora: Ora;

  constructor() {
    this.ora = ora({ stream: process.stderr, discardStdin: false });
  }

  get isSpinning(): boolean {
    return this.ora.isSpinning;
  }

  start(text?: string): Spinner {
    this.ora.start(text);
    return this;
  }

  stop(): Spinner {
    this.ora.stop();
    return this;
  }
}

/**
 * Create a spinner that respects quiet/JSON mode.
 */
export function createSpinner(): Spinner {
  if (isQuietMode() || isJsonMode()) {
    return new SilentSpinner();
  }
  return new OraSpinner();
}
