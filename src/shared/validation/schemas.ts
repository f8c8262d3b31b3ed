import { z } from 'zod';

// Action validation
// NOTE: This is the wire-level action payload. It mirrors BoardAction in
// src/shared/engine/types.ts, with the action name under `action` as the
// client sends it.
export const GameActionSchema = z.object({
  action: z.enum(['reveal', 'flag', 'chord', 'clue']),
  row: z.number().int().min(0),
  col: z.number().int().min(0),
});

export type GameActionInput = z.infer<typeof GameActionSchema>;

// Session start validation
export const StartGameSchema = z.object({
  ownerId: z.string().trim().min(1, 'ownerId is required').max(128),
  forceNew: z.boolean().default(false),
  seed: z.number().int().min(0).max(0x7fffffff).optional(), // Optional RNG seed for deterministic boards
});

export type StartGameInput = z.input<typeof StartGameSchema>;
