import type { Color, GameHost, GameSettings, HostEvent, Surface } from "../../spec/host"

export interface HostCall {
	readonly frame: number
	readonly name: string
	readonly args: readonly unknown[]
}

export interface RecordingHostOptions {
	/** Events delivered by pollEvents(), one entry per frame. */
	readonly frames?: readonly (readonly HostEvent[])[]
	/**
	 * Frame at which a quit event is delivered.
	 * Defaults to one past the last scripted frame.
	 */
	readonly quitAfter?: number
}

export interface RecordingHost extends GameHost {
	/** Every draw, log, and lifecycle call in order. */
	readonly calls: readonly HostCall[]
	/** Values passed to log(), one array per call. */
	readonly logs: readonly (readonly unknown[])[]
	readonly settings: GameSettings | null
	readonly frame: number
	readonly isShutDown: boolean
}

/**
 * Creates an in-process GameHost that replays scripted input and records
 * everything the program asks of it. Frames advance without waiting.
 */
export function createRecordingHost(options: RecordingHostOptions = {}): RecordingHost {
	const frames = options.frames ?? []
	const quitAfter = options.quitAfter ?? Math.max(frames.length, 1)
	const calls: HostCall[] = []
	const logs: unknown[][] = []
	const pressed = new Set<string>()
	let settings: GameSettings | null = null
	let frame = 0
	let isShutDown = false

	function record(name: string, args: readonly unknown[]): void {
		calls.push({ frame, name, args })
	}

	return {
		get calls() {
			return calls
		},
		get logs() {
			return logs
		},
		get settings() {
			return settings
		},
		get frame() {
			return frame
		},
		get isShutDown() {
			return isShutDown
		},

		init(s: GameSettings): Surface {
			settings = s
			record("init", [s])
			return {
				width: s.width,
				height: s.height,
				fill(color: Color) {
					record("fill", [color])
				},
			}
		},

		pollEvents(): readonly HostEvent[] {
			if (frame >= quitAfter) return [{ type: "quit" }]
			const events = frames[frame] ?? []
			for (const event of events) {
				if (event.type === "keydown") pressed.add(event.key)
				else if (event.type === "keyup") pressed.delete(event.key)
			}
			return events
		},

		isKeyPressed(key: string): boolean {
			return pressed.has(key)
		},

		drawEntity(_surface, entity) {
			record("drawEntity", [entity])
		},
		drawText(_surface, text, x, y, color, size) {
			record("drawText", size === undefined ? [text, x, y, color] : [text, x, y, color, size])
		},
		drawRect(_surface, x, y, width, height, color) {
			record("drawRect", [x, y, width, height, color])
		},
		drawCircle(_surface, x, y, radius, color) {
			record("drawCircle", [x, y, radius, color])
		},

		collides(a: object, b: object): boolean {
			const ra = bounds(a)
			const rb = bounds(b)
			return ra.x < rb.x + rb.width && rb.x < ra.x + ra.width && ra.y < rb.y + rb.height && rb.y < ra.y + ra.height
		},

		log(...values) {
			logs.push([...values])
			record("log", values)
		},

		present() {
			record("present", [])
		},

		async nextFrame() {
			frame++
		},

		shutdown() {
			isShutDown = true
			record("shutdown", [])
		},
	}
}

interface Bounds {
	x: number
	y: number
	width: number
	height: number
}

// Entities without a size are treated as one unit square
function bounds(entity: object): Bounds {
	return {
		x: numberProp(entity, "x", 0),
		y: numberProp(entity, "y", 0),
		width: numberProp(entity, "width", 1),
		height: numberProp(entity, "height", 1),
	}
}

function numberProp(entity: object, key: string, fallback: number): number {
	const value: unknown = Reflect.get(entity, key)
	return typeof value === "number" ? value : fallback
}
