/**
 * Game Host Interfaces
 *
 * Boundary: generated program → host environment (window, drawing, input,
 * frame pacing).
 *
 * Compiled games never touch a graphics library directly. Every side effect
 * goes through the `host` object handed to `main(host)`. A browser canvas,
 * a terminal renderer or a test recorder can all implement this contract.
 */

// ─── Settings ─────────────────────────────────────────────────────────────────

/** RGB triple, each channel 0-255. */
export type Color = readonly [number, number, number]

/** Folded from the `game { ... }` block, with defaults for missing keys. */
export interface GameSettings {
	readonly title: string
	readonly width: number
	readonly height: number
	/** Target frames per second, passed back to `nextFrame`. */
	readonly fps: number
	readonly background: Color
}

// ─── Events ───────────────────────────────────────────────────────────────────

/** Pending input, drained once per frame by `pollEvents`. */
export type HostEvent =
	| { readonly type: "quit" }
	| { readonly type: "keydown"; readonly key: string }
	| { readonly type: "keyup"; readonly key: string }
	| { readonly type: "mousedown"; readonly button: number; readonly x: number; readonly y: number }
	| { readonly type: "mouseup"; readonly button: number; readonly x: number; readonly y: number }
	| { readonly type: "mousemove"; readonly x: number; readonly y: number }

// ─── Host ─────────────────────────────────────────────────────────────────────

/** Drawing target returned by `init`. */
export interface Surface {
	readonly width: number
	readonly height: number
	/** Clear the whole surface to one color. Reached from source as `screen.fill(...)`. */
	fill(color: Color): void
}

export interface GameHost {
	/** Open the window (or equivalent) and return the surface to draw on. */
	init(settings: GameSettings): Surface

	/** Events that arrived since the previous call, oldest first. */
	pollEvents(): readonly HostEvent[]

	isKeyPressed(key: string): boolean

	/** Default rendering for an entity without its own `draw` method. */
	drawEntity(surface: Surface, entity: object): void
	drawText(surface: Surface, text: string, x: number, y: number, color: Color, size?: number): void
	drawRect(
		surface: Surface,
		x: number,
		y: number,
		width: number,
		height: number,
		color: Color,
	): void
	drawCircle(surface: Surface, x: number, y: number, radius: number, color: Color): void

	/** Axis-aligned overlap test between two entities. */
	collides(a: object, b: object): boolean

	log(...values: readonly unknown[]): void

	/** Show the frame drawn since the last call. */
	present(surface: Surface): void

	/** Resolve when the next frame should start. */
	nextFrame(fps: number): Promise<void>

	shutdown(): void
}

/** A compiled program bound to a host, ready to run its main loop. */
export interface GameModule {
	/** Resolves after the game quits and the host has been shut down. */
	run(): Promise<void>
}
