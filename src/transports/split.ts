/**
 * Splits text into chunks no longer than `limit`, preferring to cut at a
 * newline when one falls in the second half of the chunk.
 */
export function splitMessage(text: string, limit: number): string[] {
    const trimmed = text.trim();
    if (!trimmed) return [];
    if (trimmed.length <= limit) return [trimmed];

    const parts: string[] = [];
    let remaining = trimmed;
    while (remaining.length > limit) {
        let cut = remaining.lastIndexOf('\n', limit);
        if (cut < Math.floor(limit / 2)) cut = limit;
        // Never leave half of a surrogate pair on either side of the cut.
        if (cut > 1 && /[\ud800-\udbff]/.test(remaining[cut - 1])) cut--;
        const head = remaining.slice(0, cut).trimEnd();
        if (head) parts.push(head);
        remaining = remaining.slice(cut).trimStart();
    }
    if (remaining) parts.push(remaining);
    return parts;
}
