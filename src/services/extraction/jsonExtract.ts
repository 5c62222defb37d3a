// Embedded JSON extraction for pages that bootstrap their state in a <script>

/**
 * Returns the balanced `{...}` object text that follows `marker`, or
 * undefined. Braces inside string literals (including escaped quotes) are
 * ignored, so trailing script content after the object does not matter.
 */
export function extractJsonObject(html: string, marker: string): string | undefined {
    const markerIndex = html.indexOf(marker);
    if (markerIndex === -1) return undefined;

    let start = markerIndex + marker.length;
    while (start < html.length && /\s/.test(html[start])) {
        start++;
    }
    if (html[start] !== '{') return undefined;

    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < html.length; i++) {
        const ch = html[i];

        if (escaped) {
            escaped = false;
            continue;
        }
        if (ch === '\\' && inString) {
            escaped = true;
            continue;
        }
        if (ch === '"') {
            inString = !inString;
            continue;
        }
        if (inString) continue;

        if (ch === '{') {
            depth++;
        } else if (ch === '}') {
            depth--;
            if (depth === 0) {
                return html.slice(start, i + 1);
            }
        }
    }

    return undefined;
}

/** extractJsonObject + JSON.parse; undefined when absent or unparseable. */
export function parseEmbeddedJson(html: string, marker: string): unknown {
    const text = extractJsonObject(html, marker);
    if (text === undefined) return undefined;
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}
