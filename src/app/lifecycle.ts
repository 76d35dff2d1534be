/**
 * Process lifecycle
 *
 * One-time setup shared by every entry point. `initialize()` runs the steps
 * once; concurrent callers share the same run and a failed run can be
 * retried.
 */

import { ok, err, type Result } from 'neverthrow';

import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface LifecycleStep {
  name: string;
  run(): Promise<Result<void, Error>>;
}

export interface InitializationError {
  type: 'InitializationError';
  step: string;
  message: string;
}

export interface AppLifecycle {
  readonly initialized: boolean;
  initialize(): Promise<Result<void, InitializationError>>;
}

export interface AppLifecycleOptions {
  steps: LifecycleStep[];
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export const makeAppLifecycle = (options: AppLifecycleOptions): AppLifecycle => {
  const { steps } = options;
  const log = options.logger.child({ component: 'AppLifecycle' });

  let initialized = false;
  let running: Promise<Result<void, InitializationError>> | null = null;

  const runStep = async (step: LifecycleStep): Promise<Result<void, Error>> => {
    try {
      return await step.run();
    } catch (error) {
      return err(error instanceof Error ? error : new Error(String(error)));
    }
  };

  const runSteps = async (): Promise<Result<void, InitializationError>> => {
    for (const step of steps) {
      log.info({ step: step.name }, 'Running initialization step');

      const result = await runStep(step);
      if (result.isErr()) {
        log.error({ step: step.name, err: result.error }, 'Initialization step failed');
        return err({ type: 'InitializationError', step: step.name, message: result.error.message });
      }
    }

    initialized = true;
    log.info({ steps: steps.length }, 'Initialization complete');
    return ok(undefined);
  };

  return {
    get initialized(): boolean {
      return initialized;
    },

    initialize(): Promise<Result<void, InitializationError>> {
      if (initialized) {
        return Promise.resolve(ok(undefined));
      }

      running ??= runSteps().finally(() => {
        running = null;
      });
      return running;
    },
  };
};
