// src/engine/clinicContext.ts

import { Doctor } from '../models/Doctor';
import { Patient } from '../models/Patient';
import { Token } from '../models/Token';
import { createLogger, type Logger } from '../lib/logger';
import { BoundedQueue } from './boundedQueue';
import { Registry } from './registry';
import { SlotLedger } from './slotLedger';
import { TriageHeap } from './triageHeap';
import { UndoLog } from './undoLog';

/**
 * All mutable clinic state, passed explicitly to every operation
 *
 * Operations in src/events mutate the queue, heap and ledgers together
 * and push exactly one undo record per successful mutation.
 * Not safe for concurrent callers: every operation assumes it runs alone.
 */
export interface ClinicContext {
    readonly patients: Registry<Patient>;
    readonly doctors: Registry<Doctor>;
    readonly ledgers: Map<number, SlotLedger>;
    readonly routineQueue: BoundedQueue<Token>;
    readonly triage: TriageHeap;
    readonly undoLog: UndoLog;
    readonly served: Token[];
    readonly logger: Logger;
    nextTokenId: number;
}

export interface ClinicContextOptions {
    queueCapacity?: number;
    tokenIdStart?: number;
    logger?: Logger;
}

export const DEFAULT_QUEUE_CAPACITY = 500;
export const DEFAULT_TOKEN_ID_START = 1000;

export function createClinicContext(options: ClinicContextOptions = {}): ClinicContext {
    return {
        patients: new Registry<Patient>(),
        doctors: new Registry<Doctor>(),
        ledgers: new Map(),
        routineQueue: new BoundedQueue<Token>(options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY),
        triage: new TriageHeap(),
        undoLog: new UndoLog(),
        served: [],
        logger: options.logger ?? createLogger({ name: 'clinic' }),
        nextTokenId: options.tokenIdStart ?? DEFAULT_TOKEN_ID_START
    };
}

/**
 * Draw the next token id. Ids are global to the context and never reused.
 */
export function issueTokenId(ctx: ClinicContext): number {
    return ctx.nextTokenId++;
}

export function ledgerFor(ctx: ClinicContext, doctorId: number): SlotLedger | null {
    return ctx.ledgers.get(doctorId) ?? null;
}
