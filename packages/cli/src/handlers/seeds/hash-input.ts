/**
 * Hash Input Handler
 */

import type { z } from 'zod';
import { md5Hex, seedFromHex } from '@seedhash/core';
import type { CommandContext } from '../../core/command-context.js';
import type { hashSchema } from '../../command-defs/seeds.js';

export type HashInputArgs = z.infer<typeof hashSchema>;

export interface HashInputResult {
  input: string;
  hash: string;
  seed: number;
}

export function hashInputHandler(args: HashInputArgs, _ctx: CommandContext): HashInputResult {
  const hash = md5Hex(args.input);
  return { input: args.input, hash, seed: seedFromHex(hash) };
}
