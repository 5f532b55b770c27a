import { describe, expect, it } from 'vitest';
import type { Post } from '../types/post';
import { buildCaption } from './telegram-format';

function makePost(tags: Record<string, string[]>, overrides: Partial<Post> = {}): Post {
	return {
		id: 1234,
		tags,
		score: 87,
		favCount: 150,
		media: { url: 'https://static1.e621.net/data/aa/bb/aabb.webm', ext: 'webm', size: 1024 },
		...overrides,
	};
}

describe('buildCaption', () => {
	it('renders artists, characters, score, favorites and the post link', () => {
		const caption = buildCaption(makePost({ artist: ['first_artist', 'second_artist'], character: ['fox_(character)'] }));

		expect(caption).toBe(
			[
				'<b>Artist:</b> first_artist, second_artist',
				'<b>Characters:</b> fox_(character)',
				'<b>Score:</b> 87',
				'<b>Favorites:</b> 150',
				'<a href="https://e621.net/posts/1234">Original Post</a>',
			].join('\n')
		);
	});

	it('uses sentinels when artist or character tags are empty or absent', () => {
		const lines = buildCaption(makePost({ artist: [], general: ['solo'] })).split('\n');

		expect(lines[0]).toBe('<b>Artist:</b> Unknown Artist');
		expect(lines[1]).toBe('<b>Characters:</b> No specific character');
	});

	it('escapes HTML control characters in tag values', () => {
		const lines = buildCaption(makePost({ artist: ['<b>bold</b>'], character: ['tom_&_jerry', 'say_"hi"'] })).split('\n');

		expect(lines[0]).toBe('<b>Artist:</b> &lt;b&gt;bold&lt;/b&gt;');
		expect(lines[1]).toBe('<b>Characters:</b> tom_&amp;_jerry, say_&quot;hi&quot;');
	});

	it('leaves markdown control characters untouched', () => {
		const lines = buildCaption(makePost({ artist: ['star*_[x]'] })).split('\n');

		expect(lines[0]).toBe('<b>Artist:</b> star*_[x]');
	});

	it('escapes exactly once, so an entity-looking tag renders as written', () => {
		const lines = buildCaption(makePost({ artist: ['a&amp;b'] })).split('\n');

		expect(lines[0]).toBe('<b>Artist:</b> a&amp;amp;b');
	});

	it('truncates very long tag lists before escaping', () => {
		const characters = Array.from({ length: 80 }, (_, i) => `character_${i}`);
		const line = buildCaption(makePost({ artist: ['a'], character: characters })).split('\n')[1];
		const body = line.replace('<b>Characters:</b> ', '');

		expect(body).toHaveLength(300);
		expect(body.endsWith('…')).toBe(true);
		expect(body.startsWith('character_0, character_1, ')).toBe(true);
	});
});
