/** Cut `text` to `maxLength` characters, ending in an ellipsis when shortened. */
export function truncate(text: string, maxLength: number): string {
	const cleaned = text.replace(/\n/g, ' ').trim();
	if (cleaned.length <= maxLength) return cleaned;
	return cleaned.substring(0, maxLength - 1) + '…';
}

export function escapeHtml(str: string): string {
	return str.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}
