/**
 * Progress UI for file transfers
 * Uses cli-progress for a per-file byte counter bar
 */

import cliProgress from "cli-progress"
import chalk from "chalk"

export interface TransferProgressOptions {
	quiet: boolean
	/** Render byte counters without unit scaling */
	rawBytes: boolean
}

export interface TransferProgress {
	/** Show a bar for a new file */
	start(message: string): void
	/** Called as bytes arrive; totals of 0 (unknown) leave the bar untouched */
	update(current: number, total: number): void
	/** Fill the bar and remove it */
	finish(): void
	/** Remove the bar without filling it (failed transfer) */
	stop(): void
}

const BYTE_UNITS: ReadonlyArray<readonly [number, string]> = [
	[2 ** 10, "kB"],
	[2 ** 20, "MB"],
	[2 ** 30, "GB"],
]

const BAR_WIDTH = 30

interface BarPayload {
	current: number
	total: number
	message: string
}

// Bar currently on screen; log lines go above it while it is active
let activeBars: cliProgress.MultiBar | null = null

/**
 * Format a byte count with binary units and two decimals
 * @example formatBytes(1536) // "1.50 kB"
 */
export function formatBytes(value: number, raw: boolean = false): string {
	let coefficient = 1
	let unit = "B"
	if (!raw) {
		for (const [size, name] of BYTE_UNITS) {
			if (value > size) {
				coefficient = size
				unit = name
			}
		}
	}
	const amount = (value / coefficient).toLocaleString("en-US", {
		minimumFractionDigits: 2,
		maximumFractionDigits: 2,
	})
	return `${amount} ${unit}`
}

/**
 * Print a line without tearing an active progress bar
 */
export function progressSafeLog(message: string): void {
	if (activeBars) {
		activeBars.log(`${message}\n`)
	} else {
		console.log(message)
	}
}

/**
 * Create a progress display for sequential file transfers
 */
export function createTransferProgress(
	options: TransferProgressOptions,
): TransferProgress {
	if (options.quiet) {
		return {
			start: () => {},
			update: () => {},
			finish: () => {},
			stop: () => {},
		}
	}

	const { rawBytes } = options
	let bars: cliProgress.MultiBar | null = null
	let bar: cliProgress.SingleBar | null = null
	let current = 0
	let total = 0
	let message = ""

	const render = (): void => {
		if (!bar) return
		// cli-progress needs a non-zero total; keep the bar empty until the size is known
		bar.setTotal(total > 0 ? total : 1)
		const payload: BarPayload = { current, total, message }
		bar.update(total > 0 ? current : 0, payload)
	}

	const teardown = (): void => {
		bars?.stop()
		if (activeBars === bars) activeBars = null
		bars = null
		bar = null
	}

	return {
		start(nextMessage: string): void {
			teardown()
			current = 0
			total = 0
			message = nextMessage
			bars = new cliProgress.MultiBar(
				{
					clearOnComplete: false,
					hideCursor: true,
					fps: 10,
					format: (barOptions, params, payload: BarPayload) => {
						const filled = Math.round(params.progress * BAR_WIDTH)
						const gauge = (barOptions.barCompleteString ?? "")
							.substring(0, filled)
							.padEnd(BAR_WIDTH, barOptions.barIncompleteString ?? " ")
						const percentage = String(
							Math.round(params.progress * 100),
						).padStart(3)
						const done = formatBytes(payload.current, rawBytes)
						const size = formatBytes(payload.total, rawBytes)
						return ` ${chalk.cyan(done)} / ${size} [${gauge}] ${chalk.yellow(percentage + "%")} - ${payload.message}`
					},
				},
				cliProgress.Presets.shades_grey,
			)
			const payload: BarPayload = { current, total, message }
			bar = bars.create(1, 0, payload)
			activeBars = bars
		},

		update(nextCurrent: number, nextTotal: number): void {
			if (nextTotal <= 0) return
			current = nextCurrent
			total = nextTotal
			render()
		},

		finish(): void {
			if (total > 0) current = total
			else total = current
			render()
			teardown()
		},

		stop(): void {
			teardown()
		},
	}
}
