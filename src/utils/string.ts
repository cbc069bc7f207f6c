export function split(text: string, delimeter: string, length: number) {
	let result = text.split(delimeter);
	if (result.length > length) {
	  result = [
	    ...result.slice(0, length),
	    result.slice(length).join(delimeter)
	  ];
	}

	return result;
}

/** CID codes are compared and stored trimmed and uppercase. */
export function normalizeCode(code: string | null | undefined): string {
	return (code ?? '').trim().toUpperCase();
}

export function truncate(text: string, length: number): string {
	return text.length > length ? `${text.slice(0, length)}...` : text;
}
