import {createHash} from 'node:crypto';

/**
 * Compute SHA256 hash of a string.
 */
export function computeStringHash(content: string): string {
	return createHash('sha256').update(content).digest('hex');
}

/**
 * Content fingerprint recorded per file in repository state.
 * Line endings are normalized so a CRLF checkout of the same text matches.
 */
export function computeFingerprint(content: string): string {
	return computeStringHash(content.replace(/\r\n/g, '\n'));
}
