import type { CircuitBreakerState } from "@backtide/core";

export interface CircuitBreakerTrip {
	timestamp: number;
	drawdown: number;
}

/**
 * ARMED -> TRIPPED once drawdown reaches the threshold. Only `reset()` moves
 * it back; nothing inside a run does.
 */
export class CircuitBreaker {
	private current: CircuitBreakerState = "ARMED";
	private trip: CircuitBreakerTrip | null = null;

	constructor(
		private readonly threshold: number,
		private readonly enabled = true
	) {}

	get state(): CircuitBreakerState {
		return this.current;
	}

	get trippedAt(): CircuitBreakerTrip | null {
		return this.trip;
	}

	/** Returns true on the tick the breaker trips. */
	observe(drawdown: number, timestamp: number): boolean {
		if (!this.enabled || this.current === "TRIPPED") {
			return false;
		}
		if (drawdown + 1e-12 < this.threshold) {
			return false;
		}
		this.current = "TRIPPED";
		this.trip = { timestamp, drawdown };
		return true;
	}

	reset(): void {
		this.current = "ARMED";
		this.trip = null;
	}
}
