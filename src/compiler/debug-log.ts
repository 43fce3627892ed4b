/**
 * Debug log collector for running games.
 *
 * Collects runtime errors and a trace of host calls while a compiled game
 * runs. Attached per game and entirely opt-in.
 */

export type DebugMessageType = "trap" | "host_call"

export interface TrapMessage {
	readonly type: "trap"
	readonly frame: number
	readonly functionName: string
	readonly error: string
}

export interface HostCallMessage {
	readonly type: "host_call"
	readonly frame: number
	readonly name: string
	readonly args: readonly unknown[]
	readonly result?: unknown
}

export type DebugMessage = TrapMessage | HostCallMessage

export interface GameDebugLog {
	trap(functionName: string, error: unknown): void
	hostCall(name: string, args: readonly unknown[], result?: unknown): void
	getMessages(): readonly DebugMessage[]
}

/**
 * Create a new debug log collector.
 *
 * @param getFrame - returns the current frame number
 */
export function createDebugLog(getFrame: () => number): GameDebugLog {
	const messages: DebugMessage[] = []

	return {
		trap(functionName: string, error: unknown) {
			const errorString = error instanceof Error ? error.message : String(error)
			messages.push({
				type: "trap",
				frame: getFrame(),
				functionName,
				error: errorString,
			})
		},

		hostCall(name: string, args: readonly unknown[], result?: unknown) {
			const message: HostCallMessage = { type: "host_call", frame: getFrame(), name, args: [...args] }
			messages.push(result === undefined ? message : { ...message, result })
		},

		getMessages(): readonly DebugMessage[] {
			return messages
		},
	}
}
