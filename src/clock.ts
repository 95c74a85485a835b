// All times are epoch milliseconds.
export interface Clock {
    now(): number;
}

export class SystemClock implements Clock {
    now(): number {
        return Date.now();
    }
}

export class ManualClock implements Clock {
    private current: number;

    constructor(start: number = 0) {
        this.current = start;
    }

    now(): number {
        return this.current;
    }

    set(now: number): void {
        this.current = now;
    }

    advance(ms: number): number {
        this.current += ms;
        return this.current;
    }
}
