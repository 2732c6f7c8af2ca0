export function normalizeText(s: string): string {
    return s
        .replace(/\s+/g, " ")
        .trim();
}

/**
 * Trims, collapses whitespace and drops trailing sentence punctuation.
 * "  What's the weather in Tokyo?? " -> "What's the weather in Tokyo"
 */
export function normalizeUtterance(s: string): string {
    return normalizeText(s)
        .replace(/[\u2018\u2019]/g, "'")
        .replace(/[?.!]+$/g, "")
        .trim();
}

export function tokenize(s: string): string[] {
    return s
        .split(" ")
        .map(token => token.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, ""))
        .filter(Boolean);
}

export function escapeRegExp(s: string): string {
    return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function clip(text: string, maxChars: number): string {
    if (text.length <= maxChars) return text;
    return text.slice(0, maxChars - 1).trimEnd() + "…";
}
