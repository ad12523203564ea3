import {emptyChangeSet, type ChangeSet} from '../types.js';

/**
 * Parse NUL-separated output of `git diff --name-status -z --no-renames`.
 *
 * Records are `<status>\0<path>\0`. Copies (C) carry two paths; the second is
 * the new file. Statuses outside A/C/M/T/D (unmerged, unknown) are ignored.
 */
export function parseNameStatus(
	output: string,
	include: (filePath: string) => boolean = () => true,
): ChangeSet {
	const changes = emptyChangeSet();
	const fields = output.split('\0');
	let i = 0;

	while (i < fields.length) {
		const status = fields[i] ?? '';
		if (status === '') {
			i++;
			continue;
		}
		const code = status.charAt(0);

		if (code === 'C' || code === 'R') {
			const target = fields[i + 2] ?? '';
			if (code === 'R') {
				pushIf(changes.deleted, fields[i + 1] ?? '', include);
			}
			pushIf(changes.added, target, include);
			i += 3;
			continue;
		}

		const filePath = fields[i + 1] ?? '';
		switch (code) {
			case 'A':
				pushIf(changes.added, filePath, include);
				break;
			case 'M':
			case 'T':
				pushIf(changes.modified, filePath, include);
				break;
			case 'D':
				pushIf(changes.deleted, filePath, include);
				break;
			default:
				break;
		}
		i += 2;
	}

	return sortChangeSet(changes);
}

/**
 * Parse NUL-separated output of `git ls-tree -r --name-only -z`.
 */
export function parseFileList(
	output: string,
	include: (filePath: string) => boolean = () => true,
): string[] {
	return output
		.split('\0')
		.filter(p => p !== '' && include(p))
		.sort();
}

export function sortChangeSet(changes: ChangeSet): ChangeSet {
	return {
		added: [...new Set(changes.added)].sort(),
		modified: [...new Set(changes.modified)].sort(),
		deleted: [...new Set(changes.deleted)].sort(),
	};
}

function pushIf(
	target: string[],
	filePath: string,
	include: (filePath: string) => boolean,
) {
	if (filePath !== '' && include(filePath)) {
		target.push(filePath);
	}
}
