/**
 * Returns the index of the brace closing the object that opens at `start`, or -1.
 */
function findClosingBrace(text: string, start: number): number {
    let depth = 0;
    let inString = false;
    let escape = false;

    for (let i = start; i < text.length; i++) {
        const char = text[i];

        if (escape) {
            escape = false;
            continue;
        }

        if (char === '\\') {
            escape = true;
            continue;
        }

        if (char === '"') {
            inString = !inString;
            continue;
        }

        if (inString) continue;

        if (char === '{' || char === '[') {
            depth++;
        } else if (char === '}' || char === ']') {
            depth--;
            if (depth === 0) return i;
        }
    }

    return -1;
}

function parseLenient(jsonString: string): unknown {
    try {
        return JSON.parse(jsonString);
    } catch {
        // Trailing commas are the usual culprit
        return JSON.parse(jsonString.replace(/,\s*([\]}])/g, '$1'));
    }
}

/**
 * Pulls the first balanced top-level JSON object out of model output.
 *
 * Models sometimes wrap JSON in prose or code fences. Fences are not stripped globally
 * because backticks may appear inside string values; the scanner finds the object
 * boundaries instead. A brace in the prose (`Plan for {topic}:`) that does not open a
 * parseable object is skipped and the scan moves on to the next candidate.
 */
export function extractFirstJsonObject(text: string): unknown {
    const cleanText = text.trim();

    let start = cleanText.indexOf('{');
    if (start === -1) {
        throw new Error("No JSON object found in response");
    }

    let lastCandidate: string | null = null;
    while (start !== -1) {
        const end = findClosingBrace(cleanText, start);
        if (end === -1) {
            start = cleanText.indexOf('{', start + 1);
            continue;
        }

        const candidate = cleanText.substring(start, end + 1);
        try {
            return parseLenient(candidate);
        } catch {
            lastCandidate = candidate;
        }
        start = cleanText.indexOf('{', end + 1);
    }

    if (lastCandidate === null) {
        throw new Error("Found start of JSON object but could not find matching end brace");
    }
    console.warn("JSON Extraction Failed (Snippet):", lastCandidate.substring(0, 150) + "...");
    throw new Error("Failed to parse extracted JSON object");
}
