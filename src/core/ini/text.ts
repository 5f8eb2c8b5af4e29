// Whitespace trimming and bounded copies over the ASCII space set.
// PURITY: CORE
// INVARIANT: Only " \t\n\v\f\r" count as whitespace
// COMPLEXITY: O(n)

const WHITESPACE = new Set([" ", "\t", "\n", "\v", "\f", "\r"]);

export const isSpace = (char: string | undefined): boolean =>
	char !== undefined && WHITESPACE.has(char);

/**
 * Index of the first non-space character, or `text.length`.
 *
 * @pure true
 * @complexity O(n)
 */
export function leadingSpace(text: string): number {
	let index = 0;
	while (index < text.length && isSpace(text[index])) index += 1;
	return index;
}

/**
 * Length of `text` once trailing spaces are dropped.
 *
 * @pure true
 * @complexity O(n)
 */
export function trimmedLength(text: string): number {
	let end = text.length;
	while (end > 0 && isSpace(text[end - 1])) end -= 1;
	return end;
}

export const trimLeft = (text: string): string =>
	text.slice(leadingSpace(text));

export const trimRight = (text: string): string =>
	text.slice(0, trimmedLength(text));

/**
 * Copies at most `capacity` UTF-16 units without splitting a surrogate pair.
 *
 * @pure true
 * @invariant result.length <= capacity ∧ text.startsWith(result)
 * @complexity O(capacity)
 */
export function truncate(text: string, capacity: number): string {
	if (text.length <= capacity) return text;
	const cut = Math.max(0, capacity);
	const last = text.charCodeAt(cut - 1);
	const splitsPair = cut > 0 && last >= 0xd800 && last <= 0xdbff;
	return text.slice(0, splitsPair ? cut - 1 : cut);
}
