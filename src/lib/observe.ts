// Structured observability events, one JSON line per event on stdout.

export function logEvent(event: string, data: Record<string, unknown>) {
	console.log(JSON.stringify({ event, ts: Date.now(), ...data }));
}
