/**
 * Tokenizer
 *
 * Splits free text into lowercase word tokens. A token is a maximal run of
 * Unicode letters, ASCII digits and the `+` character; every other
 * character separates tokens.
 */

/** Separator runs: anything that is not a letter, a digit or `+` */
export const SPLIT_PATTERN = /[^\p{L}\d+]+/u;

/**
 * Tokenize a text field. Leading and trailing separators never yield
 * empty tokens.
 */
export function tokenize(text: string): string[] {
    const tokens: string[] = [];
    for (const raw of text.split(SPLIT_PATTERN)) {
        if (raw.length > 0) {
            tokens.push(raw.toLowerCase());
        }
    }
    return tokens;
}
