// PostgreSQL returns BIGINT columns as strings
export function toInt(value: string | number): number {
     return parseInt(String(value), 10);
}

export function toIntOrNull(value: string | number | null): number | null {
     return value === null ? null : toInt(value);
}
