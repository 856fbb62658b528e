import {
	DEFAULT_PROGRESS_INTERVAL,
	DEFAULT_PROGRESS_WIDTH,
	type ProgressStream,
} from "./types";

const SIZE_UNITS = ["B", "KB", "MB", "GB", "TB"] as const;

export type SizeUnit = (typeof SIZE_UNITS)[number];

/**
 * Scales a byte count into the largest decimal (1000-based) unit that does not
 * exceed it.
 */
export function formatSize(bytes: number): { value: number; unit: SizeUnit } {
	let value = bytes;
	let unitIndex = 0;

	while (value >= 1000 && unitIndex < SIZE_UNITS.length - 1) {
		value /= 1000;
		unitIndex++;
	}

	return { value, unit: SIZE_UNITS[unitIndex] };
}

function sizeLabel(bytes: number): string {
	const { value, unit } = formatSize(bytes);
	return `${value.toFixed(2)} ${unit}`;
}

/**
 * Renders a single progress line, without the leading carriage return.
 *
 * @example
 * ```typescript
 * renderProgressBar(50, 200, 10);
 * // "[==        ]  25.0% (50.00 B/200.00 B)"
 * ```
 */
export function renderProgressBar(
	processed: number,
	total: number,
	width: number,
): string {
	const safeTotal = total === 0 ? 1 : total;
	const ratio = processed / safeTotal;
	const filled = Math.min(Math.floor(ratio * width), width);
	const bar = "=".repeat(filled) + " ".repeat(width - filled);
	const percent = (ratio * 100).toFixed(1).padStart(5);

	return `[${bar}] ${percent}% (${sizeLabel(processed)}/${sizeLabel(total)})`;
}

/**
 * Throws a `RangeError` unless the bar width is a positive integer and the redraw
 * interval a finite, non-negative number of milliseconds.
 */
export function assertProgressSettings(
	interval: number = DEFAULT_PROGRESS_INTERVAL,
	width: number = DEFAULT_PROGRESS_WIDTH,
): void {
	if (!Number.isInteger(width) || width <= 0) {
		throw new RangeError(
			`Progress width must be a positive integer, got ${width}.`,
		);
	}
	if (!Number.isFinite(interval) || interval < 0) {
		throw new RangeError(
			`Progress interval must be a non-negative number, got ${interval}.`,
		);
	}
}

export interface ProgressReporterOptions {
	/** Sum of all payload sizes. */
	total: number;
	stream: ProgressStream;
	interval?: number;
	width?: number;
	now?: () => number;
}

/**
 * Tracks bytes copied across a whole build and redraws a progress bar in place.
 *
 * One reporter belongs to one build. Redraws are throttled by wall-clock time, not by
 * the number of chunks copied.
 */
export class ProgressReporter {
	readonly total: number;
	private processed = 0;
	private lastWidth = 0;
	private lastRender: number;
	private readonly stream: ProgressStream;
	private readonly interval: number;
	private readonly width: number;
	private readonly now: () => number;

	constructor(options: ProgressReporterOptions) {
		assertProgressSettings(options.interval, options.width);

		this.total = options.total;
		this.stream = options.stream;
		this.interval = options.interval ?? DEFAULT_PROGRESS_INTERVAL;
		this.width = options.width ?? DEFAULT_PROGRESS_WIDTH;
		this.now = options.now ?? Date.now;
		this.lastRender = this.now();
	}

	get processedBytes(): number {
		return this.processed;
	}

	/** Prints a full line of text, e.g. the entry being processed. */
	log(message: string): void {
		this.stream.write(`${message}\n`);
	}

	/** Records copied bytes and redraws the bar if the interval has passed. */
	advance(bytes: number): void {
		this.processed += bytes;

		const now = this.now();
		if (now - this.lastRender >= this.interval) {
			this.render();
			this.lastRender = now;
		}
	}

	/** Draws the bar now, replacing whatever was drawn before. */
	render(): void {
		const line = `\r${renderProgressBar(this.processed, this.total, this.width)}`;
		this.clear();
		this.stream.write(line);
		this.lastWidth = line.length;
	}

	/** Blanks out the last drawn bar and returns the cursor to the line start. */
	clear(): void {
		if (this.lastWidth === 0) return;
		this.stream.write(`\r${" ".repeat(this.lastWidth)}\r`);
		this.lastWidth = 0;
	}
}
