/** `YYYY-MM-DD HH:MM:SS` in UTC, or the raw seconds when `Date` cannot hold them */
export function formatBlockTime(unixSeconds: number): string {
	const date = new Date(unixSeconds * 1000);
	if (Number.isNaN(date.getTime())) {
		return `${unixSeconds}`;
	}
	return date.toISOString().slice(0, 19).replace('T', ' ');
}
