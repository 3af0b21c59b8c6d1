// src/models/Patient.ts

/**
 * Patient model
 *
 * Replaced wholesale on re-registration (upsert), never auto-deleted.
 * `severity` is the hint captured at the registration desk; triage uses
 * the severity given at insertion time.
 */
export interface Patient {
    id: number;
    name: string;
    age: number;
    severity: number;
    history: string[];
}
