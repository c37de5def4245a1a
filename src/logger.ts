export type LogLevel = "info" | "error" | "silent";

/**
 * Destination for extraction diagnostics. `info` carries progress lines,
 * `error` carries failures.
 */
export interface Logger {
	info(message: string): void;
	error(message: string): void;
}

export function createLogger(level: LogLevel = "info"): Logger {
	const order: LogLevel[] = ["info", "error", "silent"];
	const minIdx = order.indexOf(level);
	const enabled = (lvl: LogLevel) => order.indexOf(lvl) >= minIdx;

	return {
		info: (message: string) => {
			if (enabled("info")) console.log(message);
		},
		error: (message: string) => {
			if (enabled("error")) console.error(message);
		},
	};
}
