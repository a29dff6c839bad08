import { getRandomValues } from "node:crypto";

import type { Outcome } from "./dispatch.ts";

export interface RequestLogEntry {
	readonly id: string;
	readonly startTime: number;
	readonly method: string;
	readonly path: string;
}

export interface ResponseLogEntry {
	readonly id: string;
	readonly startTime: number;
	readonly endTime: number;
	readonly deltaTime: number;
	readonly status: number;
	readonly outcome: Outcome["kind"];
	/** Name of the route that produced the outcome, when one matched. */
	readonly route: string | null;
}

/** Hooks called around every Router dispatch. */
export interface DispatchLogger {
	request(entry: RequestLogEntry): void;
	response(entry: ResponseLogEntry): void;
}

const ID_ALPHABET = "useandom26T198340PX75pxJACKVERYMINDBUSHWOLFGQZbfghjklqvwyzrict";

/** Short random id used to correlate the request and response lines. */
export function requestId(size = 12): string {
	const random = getRandomValues(new Uint8Array(size));
	let id = "";
	for (const byte of random) {
		id += ID_ALPHABET.charAt(byte & 61);
	}
	return id;
}

export const consoleLogger: DispatchLogger = {
	request({ id, startTime, method, path }) {
		console.log(`[${startTime}][${id}] ${method} ${path}`);
	},
	response({ id, endTime, deltaTime, status, route }) {
		const via = route !== null ? ` via ${route}` : "";
		console.log(`[${endTime}][${id}] ${status} in ${deltaTime}ms${via}`);
	},
};

export const silentLogger: DispatchLogger = {
	request() {},
	response() {},
};
