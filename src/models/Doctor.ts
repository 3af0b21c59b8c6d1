// src/models/Doctor.ts

/**
 * Doctor model - immutable once registered
 */
export interface Doctor {
    readonly id: number;
    readonly name: string;
    readonly specialization: string;
}
