const UPPERCASE = /^\p{Lu}$/u;
const ALPHANUMERIC = /^[\p{L}\p{N}]$/u;

const isUppercase = (char: string): boolean => UPPERCASE.test(char);
const isAlphanumeric = (char: string): boolean => ALPHANUMERIC.test(char);

/**
 * Split an identifier into words at case transitions and where an
 * alphanumeric character follows a non-alphanumeric one. Separators stay
 * attached, and leading ones belong to the word they precede:
 * `_hello_world_` gives `_hello_` and `world_`.
 */
export function splitWords(text: string): string[] {
	const words: string[] = [];
	let wordStart = 0;
	let wordHasAlphanumeric = false;
	let offset = 0;
	let previous: string | null = null;

	for (const char of text) {
		if (previous !== null && wordHasAlphanumeric) {
			const isBoundary =
				(!isUppercase(previous) && isUppercase(char)) ||
				(!isAlphanumeric(previous) && isAlphanumeric(char));
			if (isBoundary) {
				words.push(text.slice(wordStart, offset));
				wordStart = offset;
				wordHasAlphanumeric = false;
			}
		}
		if (isAlphanumeric(char)) {
			wordHasAlphanumeric = true;
		}
		previous = char;
		offset += char.length;
	}

	if (offset > wordStart) {
		words.push(text.slice(wordStart));
	}
	return words;
}
