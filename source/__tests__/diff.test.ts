/**
 * Parsing of git name-status and ls-tree output.
 */

import {describe, it, expect} from 'vitest';
import {parseFileList, parseNameStatus} from '../mirror/diff.js';

describe('parseNameStatus', () => {
	it('sorts records into added, modified and deleted', () => {
		const output = 'M\0src/a.py\0D\0old.py\0A\0src/b.py\0T\0link.py\0';

		expect(parseNameStatus(output)).toEqual({
			added: ['src/b.py'],
			modified: ['link.py', 'src/a.py'],
			deleted: ['old.py'],
		});
	});

	it('treats a rename as delete plus add and a copy as add', () => {
		const output = 'R100\0old.py\0new.py\0C75\0a.py\0b.py\0';

		expect(parseNameStatus(output)).toEqual({
			added: ['b.py', 'new.py'],
			modified: [],
			deleted: ['old.py'],
		});
	});

	it('ignores unmerged entries and applies the filter', () => {
		const output = 'U\0conflict.py\0A\0README.md\0A\0main.go\0';

		expect(parseNameStatus(output, p => p.endsWith('.go'))).toEqual({
			added: ['main.go'],
			modified: [],
			deleted: [],
		});
	});

	it('returns an empty change set for empty output', () => {
		expect(parseNameStatus('')).toEqual({added: [], modified: [], deleted: []});
	});
});

describe('parseFileList', () => {
	it('splits on NUL, filters and sorts', () => {
		const output = 'src/z.ts\0docs/guide.md\0src/a.ts\0';

		expect(parseFileList(output, p => p.endsWith('.ts'))).toEqual([
			'src/a.ts',
			'src/z.ts',
		]);
	});
});
