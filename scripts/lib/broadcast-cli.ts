/**
 * Argument parsing and progress reporting for send-broadcast.
 */

import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { ok, err, type Result } from 'neverthrow';

import { RecipientSchema } from '../../src/modules/messaging/shell/rest/schemas.js';

import type { DispatchProgressEvent, Recipient } from '../../src/modules/messaging/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Arguments
// ─────────────────────────────────────────────────────────────────────────────

export interface BroadcastOptions {
  recipientsFile: string;
  template: string;
  groupId?: string;
}

export const USAGE =
  'Usage: tsx scripts/send-broadcast.ts --recipients <file.json> --template <text> [--group <id>]';

export const parseBroadcastArgs = (args: readonly string[]): Result<BroadcastOptions, string> => {
  let recipientsFile: string | undefined;
  let template: string | undefined;
  let groupId: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];

    switch (arg) {
      case '--recipients':
      case '--template':
      case '--group':
        if (nextArg === undefined) {
          return err(`Missing value for ${arg}`);
        }
        if (arg === '--recipients') recipientsFile = nextArg;
        else if (arg === '--template') template = nextArg;
        else groupId = nextArg;
        i++;
        break;
      default:
        return err(`Unknown argument: ${String(arg)}`);
    }
  }

  if (recipientsFile === undefined || template === undefined || template === '') {
    return err('--recipients and --template are required');
  }

  return ok({ recipientsFile, template, ...(groupId !== undefined ? { groupId } : {}) });
};

// ─────────────────────────────────────────────────────────────────────────────
// Recipients file
// ─────────────────────────────────────────────────────────────────────────────

const RecipientsFileSchema = Type.Array(RecipientSchema);

/**
 * Validates the parsed contents of a recipients file (a JSON array).
 */
export const parseRecipients = (content: unknown): Result<Recipient[], string> => {
  if (!Value.Check(RecipientsFileSchema, content)) {
    const first = [...Value.Errors(RecipientsFileSchema, content)][0];
    return err(
      first !== undefined
        ? `Invalid recipients file at ${first.path}: ${first.message}`
        : 'Invalid recipients file'
    );
  }

  return ok(
    content.map((entry) => ({
      phone: entry.phone,
      ...(entry.firstName !== undefined ? { firstName: entry.firstName } : {}),
      ...(entry.lastName !== undefined ? { lastName: entry.lastName } : {}),
      ...(entry.name !== undefined ? { name: entry.name } : {}),
      ...(entry.contactId !== undefined ? { contactId: entry.contactId } : {}),
    }))
  );
};

// ─────────────────────────────────────────────────────────────────────────────
// Progress
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Decides which progress events get reported: the first, the last, and at
 * most one per interval in between.
 */
export const makeProgressThrottle = (
  intervalMs: number,
  now: () => number
): ((event: DispatchProgressEvent) => boolean) => {
  let lastReportedAt: number | null = null;

  return (event) => {
    const current = now();
    const isLast = event.current === event.total;
    if (lastReportedAt === null || isLast || current - lastReportedAt >= intervalMs) {
      lastReportedAt = current;
      return true;
    }
    return false;
  };
};
