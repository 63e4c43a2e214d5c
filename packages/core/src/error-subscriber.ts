import { LogLevel } from "@coursecheck/constants";
import { isPhasePayload, type BusPayload } from "@coursecheck/event-bus";
import type { PipelineError } from "./types";

/**
 * Subscribes to ERROR-level payloads via bus.onLevel(LogLevel.ERROR) and
 * accumulates them as PipelineError[].
 */
export class ErrorSubscriber {
	readonly errors: PipelineError[] = [];

	get count(): number {
		return this.errors.length;
	}

	handle(event: BusPayload): void {
		if (isPhasePayload(event) || event.level !== LogLevel.ERROR) {
			return;
		}

		this.errors.push({
			phase: event.phase,
			path: event.path,
			message: event.message,
			code: event.code,
			userMessage: event.userMessage,
		});
	}
}
