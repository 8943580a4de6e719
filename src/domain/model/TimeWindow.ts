import { InvalidWindowError } from './InspectionError.js';

/**
 * Closed interval of time, in seconds since the epoch.
 */
export interface TimeWindow {
    start: number;
    end: number;
}

export interface TimeWindowInput {
    start?: number;
    end?: number;
    /** Length of the window in seconds. Combined with whichever bound is given. */
    window?: number;
}

export function createTimeWindow(input: TimeWindowInput): TimeWindow {
    const { start, end, window } = input;

    assertFinite('start', start);
    assertFinite('end', end);
    assertFinite('window', window);

    if (window !== undefined && window < 0) {
        throw new InvalidWindowError(`window must not be negative (got ${window})`);
    }

    if (start !== undefined && end !== undefined) {
        // Bounds given the wrong way around are swapped
        return { start: Math.min(start, end), end: Math.max(start, end) };
    }

    if (end !== undefined) {
        if (window === undefined) {
            throw new InvalidWindowError('end requires start or window');
        }
        return { start: end - window, end };
    }

    if (start !== undefined) {
        if (window === undefined) {
            throw new InvalidWindowError('start requires end or window');
        }
        return { start, end: start + window };
    }

    throw new InvalidWindowError('either end or start is required');
}

export function contains(window: TimeWindow, timestamp: number): boolean {
    return window.start <= timestamp && timestamp <= window.end;
}

function assertFinite(name: string, value: number | undefined): void {
    if (value !== undefined && !Number.isFinite(value)) {
        throw new InvalidWindowError(`${name} must be a finite number (got ${value})`);
    }
}
