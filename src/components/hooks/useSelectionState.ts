import { useEffect, useReducer } from "react";
import type { SelectionState } from "../../lib/selection.js";

/**
 * Drives the render loop for a session: every `tickMs` the status
 * countdown decays and the screen is redrawn, whether or not a key
 * arrived. `refresh` redraws after a mutation made outside the tick.
 */
export function useSelectionState(state: SelectionState, tickMs: number) {
	const [, refresh] = useReducer((count: number) => count + 1, 0);

	useEffect(() => {
		const timer = setInterval(() => {
			state.tickStatus();
			refresh();
		}, tickMs);

		return () => clearInterval(timer);
	}, [state, tickMs]);

	return { refresh };
}
