import { CollaboratorError } from "./CollaboratorError";

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Non-empty string field, or undefined.
 */
export function readString(record: JsonRecord, key: string): string | undefined {
    const value = record[key];
    return typeof value === "string" && value.length > 0 ? value : undefined;
}

export function readNumber(record: JsonRecord, key: string): number | undefined {
    const value = record[key];
    return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

/**
 * First element of an array field, if it is an object.
 */
export function readFirstRecord(record: JsonRecord, key: string): JsonRecord | undefined {
    const value = record[key];
    if (!Array.isArray(value) || value.length === 0) return undefined;
    const first: unknown = value[0];
    return isRecord(first) ? first : undefined;
}

export async function readJsonBody(response: Response, source: string): Promise<unknown> {
    try {
        const body: unknown = await response.json();
        return body;
    } catch (error) {
        throw new CollaboratorError("malformed", `${source} returned a body that is not JSON`, error);
    }
}
