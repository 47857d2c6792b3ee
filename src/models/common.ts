// Shape checks for documents read back from MongoDB

export type Scalar = string | number | boolean;

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function hasString(doc: Record<string, unknown>, field: string): boolean {
    return typeof doc[field] === 'string';
}

export function hasNumber(doc: Record<string, unknown>, field: string): boolean {
    return typeof doc[field] === 'number' && Number.isInteger(doc[field]);
}

// Stored amounts are zero-padded unsigned decimal strings
export function hasAmount(doc: Record<string, unknown>, field: string): boolean {
    const value = doc[field];
    return typeof value === 'string' && /^[0-9]+$/.test(value);
}

export function isScalarRecord(value: unknown): value is Record<string, Scalar> {
    if (!isRecord(value)) return false;
    return Object.values(value).every(v => typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean');
}
