/**
 * JSON-safe board snapshots.
 *
 * Hosts persist boards between actions; CoordSet instances do not survive
 * JSON round-trips, so the engine defines its own wire shape here. Loading a
 * snapshot re-checks every board invariant, since the data may have been
 * edited or truncated outside the engine.
 */

import { z } from 'zod';
import { CoordSet } from './CoordSet';
import { isInBounds } from './boardGeometry';
import { EngineErrorCode, InvalidState } from './errors';
import { computeAdjacentCounts } from './minePlacement';
import { safeCellCount } from './revealLogic';
import type { BoardState, Coord, InitializedBoard } from './types';

const CoordPairSchema = z.tuple([z.number().int().min(0), z.number().int().min(0)]);
const DimensionSchema = z.number().int().min(1);

export const UninitializedSnapshotSchema = z.object({
  phase: z.literal('uninitialized'),
  rows: DimensionSchema,
  cols: DimensionSchema,
  flagged: z.array(CoordPairSchema),
});

export const InitializedSnapshotSchema = z.object({
  phase: z.literal('initialized'),
  rows: DimensionSchema,
  cols: DimensionSchema,
  mines: z.array(CoordPairSchema),
  revealed: z.array(CoordPairSchema),
  flagged: z.array(CoordPairSchema),
  immuneFlags: z.array(CoordPairSchema),
  adjacentCounts: z.array(z.array(z.number().int().min(0).max(8).nullable())),
  outcome: z.enum(['playing', 'won', 'lost']),
});

export const BoardSnapshotSchema = z.discriminatedUnion('phase', [
  UninitializedSnapshotSchema,
  InitializedSnapshotSchema,
]);

export type BoardSnapshot = z.infer<typeof BoardSnapshotSchema>;
type CoordPair = z.infer<typeof CoordPairSchema>;

function toPairs(set: CoordSet): CoordPair[] {
  return set.toArray().map(({ row, col }) => [row, col]);
}

export function toBoardSnapshot(state: BoardState): BoardSnapshot {
  if (state.phase === 'uninitialized') {
    return {
      phase: 'uninitialized',
      rows: state.rows,
      cols: state.cols,
      flagged: toPairs(state.flagged),
    };
  }

  return {
    phase: 'initialized',
    rows: state.rows,
    cols: state.cols,
    mines: toPairs(state.mines),
    revealed: toPairs(state.revealed),
    flagged: toPairs(state.flagged),
    immuneFlags: toPairs(state.immuneFlags),
    adjacentCounts: state.adjacentCounts.map((line) => [...line]),
    outcome: state.outcome,
  };
}

function invalid(message: string, context: Record<string, unknown> = {}): InvalidState {
  return new InvalidState(EngineErrorCode.STATE_INVALID_SNAPSHOT, message, context, 'Snapshot');
}

function toCoordSet(
  dims: { rows: number; cols: number },
  field: string,
  pairs: CoordPair[]
): CoordSet {
  const coords: Coord[] = pairs.map(([row, col]) => ({ row, col }));
  const outside = coords.find((c) => !isInBounds(dims, c.row, c.col));
  if (outside) {
    throw invalid(`${field} contains out-of-bounds coordinate (${outside.row}, ${outside.col})`, {
      field,
      coord: outside,
    });
  }
  const set = CoordSet.of(dims.cols, coords);
  if (set.size !== coords.length) {
    throw invalid(`${field} contains duplicate coordinates`, { field });
  }
  return set;
}

function checkInvariants(board: InitializedBoard): void {
  if (!board.immuneFlags.isSubsetOf(board.flagged)) {
    throw invalid('immuneFlags must be a subset of flagged');
  }
  if (board.outcome === 'lost') {
    if (!board.mines.isSubsetOf(board.revealed)) {
      throw invalid('a lost board must have every mine revealed');
    }
    // Only a disclosed mine may be both flagged and revealed.
    if (board.flagged.toArray().some((c) => board.revealed.has(c) && !board.mines.has(c))) {
      throw invalid('a cell cannot be both flagged and revealed');
    }
  } else {
    if (board.flagged.intersects(board.revealed)) {
      throw invalid('a cell cannot be both flagged and revealed');
    }
    if (board.mines.intersects(board.revealed)) {
      throw invalid('mines may only be revealed on a lost board', { outcome: board.outcome });
    }
  }

  const safeRevealed = board.revealed.toArray().filter((c) => !board.mines.has(c)).length;
  const fullyCovered = safeRevealed === safeCellCount(board);
  if (board.outcome === 'won' && !fullyCovered) {
    throw invalid('a won board must have every safe cell revealed');
  }
  if (board.outcome === 'playing' && fullyCovered) {
    throw invalid('a board with every safe cell revealed must be won');
  }

  const expected = computeAdjacentCounts(board, board.mines);
  const matches =
    board.adjacentCounts.length === board.rows &&
    board.adjacentCounts.every(
      (line, row) =>
        line.length === board.cols && line.every((count, col) => count === expected[row][col])
    );
  if (!matches) {
    throw invalid('adjacentCounts do not match the mine layout');
  }
}

/**
 * Rebuild a board from untrusted snapshot data.
 *
 * @throws InvalidState when the data fails the schema or any board invariant.
 */
export function fromBoardSnapshot(input: unknown): BoardState {
  const parsed = BoardSnapshotSchema.safeParse(input);
  if (!parsed.success) {
    throw invalid('Board snapshot failed validation', {
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }

  const snapshot = parsed.data;
  const dims = { rows: snapshot.rows, cols: snapshot.cols };

  if (snapshot.phase === 'uninitialized') {
    return {
      phase: 'uninitialized',
      ...dims,
      flagged: toCoordSet(dims, 'flagged', snapshot.flagged),
    };
  }

  const board: InitializedBoard = {
    phase: 'initialized',
    ...dims,
    mines: toCoordSet(dims, 'mines', snapshot.mines),
    revealed: toCoordSet(dims, 'revealed', snapshot.revealed),
    flagged: toCoordSet(dims, 'flagged', snapshot.flagged),
    immuneFlags: toCoordSet(dims, 'immuneFlags', snapshot.immuneFlags),
    adjacentCounts: snapshot.adjacentCounts,
    outcome: snapshot.outcome,
  };
  checkInvariants(board);
  return board;
}
