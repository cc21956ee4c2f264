export interface Clock {
	now(): Date;
	/** Schedules `callback` once and returns a function that cancels it. */
	setTimeout(callback: () => void, ms: number): () => void;
}

export const systemClock: Clock = {
	now: () => new Date(),
	setTimeout: (callback, ms) => {
		const timer = setTimeout(callback, ms);
		return () => clearTimeout(timer);
	},
};
