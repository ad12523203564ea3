/**
 * Fallback windowing.
 *
 * Line-based sliding window with a character budget. Each line counts its
 * length plus one for the newline. A window closes before the line that would
 * push it past maxSize; the next window starts with the trailing lines of the
 * previous one whose combined size is at most `overlap`. A single line longer
 * than maxSize becomes a window on its own.
 */

export interface LineWindow {
	content: string;
	/** 1-based, inclusive */
	startLine: number;
	/** 1-based, inclusive */
	endLine: number;
}

/**
 * Split content into lines, ignoring one trailing newline.
 */
export function splitLines(content: string): string[] {
	const body = content.endsWith('\n') ? content.slice(0, -1) : content;
	return body.split('\n');
}

/**
 * Window a run of lines. `firstLine` is the 1-based number of lines[0].
 * Windows that are blank after trimming are dropped.
 */
export function windowLines(
	lines: readonly string[],
	maxSize: number,
	overlap: number,
	firstLine: number = 1,
): LineWindow[] {
	const windows: LineWindow[] = [];
	let current: string[] = [];
	let currentSize = 0;
	let start = 0;

	const flush = (end: number) => {
		const content = current.join('\n');
		if (content.trim().length > 0) {
			windows.push({
				content,
				startLine: firstLine + start,
				endLine: firstLine + end - 1,
			});
		}
	};

	lines.forEach((line, i) => {
		const lineSize = line.length + 1;

		if (current.length > 0 && currentSize + lineSize > maxSize) {
			flush(i);

			const carried: string[] = [];
			let carriedSize = 0;
			for (let j = current.length - 1; j >= 0; j--) {
				const size = (current[j] ?? '').length + 1;
				if (carriedSize + size > overlap) break;
				carried.unshift(current[j] ?? '');
				carriedSize += size;
			}
			// Carrying the whole window would only repeat it
			if (carried.length === current.length) {
				carried.length = 0;
				carriedSize = 0;
			}

			current = carried;
			currentSize = carriedSize;
			start = i - carried.length;
		}

		current.push(line);
		currentSize += lineSize;
	});

	if (current.length > 0) {
		flush(lines.length);
	}

	return windows;
}

/**
 * Window a whole file. Blank content yields no windows.
 */
export function windowContent(
	content: string,
	maxSize: number,
	overlap: number,
): LineWindow[] {
	if (content.trim().length === 0) {
		return [];
	}
	return windowLines(splitLines(content), maxSize, overlap);
}
