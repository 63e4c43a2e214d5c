import { logFields, type Logger, type AppLogObj } from "@coursecheck/logger";
import { LogLevel, PhaseEvent, PipelinePhaseLabels } from "@coursecheck/constants";
import { isPhasePayload, type BusPayload, type PhasePayload } from "@coursecheck/event-bus";

/**
 * Subscribes to all payloads via bus.onAll() and routes them to the
 * appropriate Logger method based on payload level.
 *
 * Routing:
 *   ERROR, WARN  → logger.warn()
 *   INFO         → logger.info()
 *   DEBUG        → logger.debug()
 *   PhasePayload → logger.info() (with phase start/end formatting)
 *
 * Every line carries structured fields: the phase, the file it concerns
 * and, once a transcript has been validated, its student id.
 */
export class LogSubscriber {
	private readonly logger: Logger<AppLogObj>;

	constructor(logger: Logger<AppLogObj>) {
		this.logger = logger;
	}

	handle(event: BusPayload): void {
		if (isPhasePayload(event)) {
			this.logPhase(event);
			return;
		}

		switch (event.level) {
			case LogLevel.ERROR:
				this.logger.warn(event.message, logFields(event.phase, { path: event.path, code: event.code }));
				break;
			case LogLevel.WARN:
				this.logger.warn(event.message, logFields(event.phase, event.context));
				break;
			case LogLevel.INFO:
				this.logger.info(event.message, logFields(event.phase, event.context));
				break;
			case LogLevel.DEBUG:
				this.logger.debug(event.message, logFields(event.phase, event.context));
				break;
		}
	}

	private logPhase(event: PhasePayload): void {
		const label = PipelinePhaseLabels[event.phase];
		const verb = event.event === PhaseEvent.PHASE_START ? "started" : "ended";
		this.logger.info(`${label} phase ${verb}`, logFields(event.phase, event.stats));
	}
}
