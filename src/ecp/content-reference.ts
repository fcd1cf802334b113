// src/ecp/content-reference.ts
// Composite content identifiers: "appId,contentId[,key=value]*".
// The grammar is shared with existing automations, so it must not drift.

import { InvalidContentReferenceError } from './errors.js';
import type { ContentReference } from './types.js';

const CONTENT_ID_PARAM = 'contentId';

export function parseContentReference(input: string): ContentReference {
	const [appId = '', contentId = '', ...extras] = input.split(',').map((token) => token.trim());

	if (appId.length === 0) {
		throw new InvalidContentReferenceError(input, 'missing application id');
	}
	if (contentId.length === 0) {
		throw new InvalidContentReferenceError(input, 'missing content id');
	}

	const params: Record<string, string> = {};
	for (const token of extras) {
		const eq = token.indexOf('=');
		// Tokens without a key=value shape carry nothing we can forward.
		if (eq <= 0) {
			continue;
		}
		const key = token.slice(0, eq).trim();
		if (key.length === 0 || key === CONTENT_ID_PARAM) {
			continue;
		}
		params[key] = token.slice(eq + 1).trim();
	}

	return Object.freeze({
		appId,
		contentId,
		params: Object.freeze(params),
	});
}

export function buildQuery(params: Readonly<Record<string, string>>): string {
	return Object.entries(params)
		.map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(value)}`)
		.join('&');
}

/**
 * Launch path for a deep link: contentId first, extra parameters after it in
 * the order they were given.
 */
export function contentReferenceToLaunchPath(ref: ContentReference): string {
	const query = buildQuery({ [CONTENT_ID_PARAM]: ref.contentId, ...ref.params });
	return `launch/${encodeURIComponent(ref.appId)}?${query}`;
}
