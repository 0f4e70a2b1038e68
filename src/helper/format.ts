export function hexPattern(value: bigint, width: number): string {
    const digits = Math.ceil(width / 4);

    return `0x${(value & ((1n << BigInt(width)) - 1n)).toString(16).padStart(digits, '0')}`;
}

export function uintval<T>(value: T): number | undefined;
export function uintval<T>(value: T, defaultValue: number): number;
export function uintval<T>(value: T, defaultValue?: number | undefined): number | undefined {
    if (typeof value === 'number') return value;
    if (typeof value !== 'string') return defaultValue;

    if (!/^(0x[0-9a-fA-F]+|[0-9]+)$/.test(value)) return defaultValue;

    const parsed = value.startsWith('0x') ? parseInt(value.substring(2), 16) : parseInt(value, 10);

    return isNaN(parsed) || parsed < 0 ? defaultValue : parsed;
}

export function bigintval(value: string | undefined): bigint | undefined {
    if (value === undefined || value.trim() === '') return undefined;

    try {
        const parsed = BigInt(value);

        return parsed < 0n ? undefined : parsed;
    } catch (e) {
        return undefined;
    }
}
