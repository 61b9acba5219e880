// Order numbers read CMD-YYYY-MM-NNNN and restart at 0001 every month (UTC)

export function orderNumberPrefix(now: Date): string {
     const month = String(now.getUTCMonth() + 1).padStart(2, '0');
     return `CMD-${now.getUTCFullYear()}-${month}`;
}

export function formatOrderNumber(prefix: string, sequence: number): string {
     return `${prefix}-${String(sequence).padStart(4, '0')}`;
}
