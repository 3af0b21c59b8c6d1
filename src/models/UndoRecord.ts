// src/models/UndoRecord.ts

import { Token } from './Token';

/**
 * Mutating actions that can be reverted
 */
export enum UndoAction {
    BOOK = 'BOOK',
    CANCEL = 'CANCEL',
    SERVE_ROUTINE = 'SERVE_ROUTINE',
    SERVE_TRIAGE = 'SERVE_TRIAGE',
    TRIAGE_INSERT = 'TRIAGE_INSERT'
}

/**
 * Heap entry as stored by the triage heap.
 * `sequence` is the insertion-order tiebreaker for equal severities.
 */
export interface TriageEntry {
    readonly token: Token;
    readonly severity: number;
    readonly sequence: number;
}

export type UndoRecord =
    | { action: UndoAction.BOOK; token: Token }
    | { action: UndoAction.CANCEL; token: Token }
    | { action: UndoAction.SERVE_ROUTINE; token: Token }
    | { action: UndoAction.SERVE_TRIAGE; token: Token; entry: TriageEntry }
    | { action: UndoAction.TRIAGE_INSERT; token: Token; severity: number };

/**
 * Outcome of a single undo call
 */
export interface UndoResult {
    undone: boolean;
    action: UndoAction | null;
    tokenId: number | null;
    message: string;
}
