export interface TimingResult {
    label: string;
    durationMs: number;
}

export type LogLevel = "INFO" | "WARN" | "ERROR" | "DEBUG";

/**
 * Process-wide logger. Everything goes to stderr: stdout is reserved for
 * optimization results and the MCP stdio transport.
 */
class Logger {
    private static instance: Logger;
    private timings: TimingResult[] = [];
    private timingEnabled: boolean = false;
    private debugEnabled: boolean = false;

    private constructor() {
        // Private constructor to prevent direct instantiation
    }

    public static getInstance(): Logger {
        if (!Logger.instance) {
            Logger.instance = new Logger();
        }
        return Logger.instance;
    }

    private write(level: LogLevel, message: string): void {
        console.error(`[${new Date().toISOString()}] [${level}] ${message}`);
    }

    public log(message: string): void {
        this.write("INFO", message);
    }

    public warn(message: string): void {
        this.write("WARN", message);
    }

    public error(message: string): void {
        this.write("ERROR", message);
    }

    public debug(message: string): void {
        if (this.debugEnabled) {
            this.write("DEBUG", message);
        }
    }

    public setDebugEnabled(enabled: boolean): void {
        this.debugEnabled = enabled;
    }

    /**
     * Enable or disable timing collection
     */
    public setTimingEnabled(enabled: boolean): void {
        this.timingEnabled = enabled;
        if (enabled) {
            this.timings = [];
        }
    }

    /**
     * Time a synchronous function and record the result
     */
    public time<T>(label: string, fn: () => T): T {
        if (!this.timingEnabled) {
            return fn();
        }
        const start = performance.now();
        const result = fn();
        this.timings.push({ label, durationMs: performance.now() - start });
        return result;
    }

    /**
     * Time an async function; the duration is recorded even if it rejects
     */
    public async timeAsync<T>(label: string, fn: () => Promise<T>): Promise<T> {
        if (!this.timingEnabled) {
            return fn();
        }
        const start = performance.now();
        try {
            return await fn();
        } finally {
            this.timings.push({ label, durationMs: performance.now() - start });
        }
    }

    public getTimings(): TimingResult[] {
        return [...this.timings];
    }

    /**
     * Print timing summary to stderr
     */
    public printTimings(): void {
        if (this.timings.length === 0) {
            console.error("[TIMING] No timings recorded");
            return;
        }

        console.error("\n[TIMING] === Performance Summary ===");
        const total = this.timings.reduce((sum, t) => sum + t.durationMs, 0);

        for (const timing of this.timings) {
            const pct = total > 0 ? ((timing.durationMs / total) * 100).toFixed(1) : "0.0";
            console.error(`[TIMING] ${timing.label.padEnd(30)} ${timing.durationMs.toFixed(2).padStart(8)}ms (${pct.padStart(5)}%)`);
        }

        console.error(`[TIMING] ${"TOTAL".padEnd(30)} ${total.toFixed(2).padStart(8)}ms`);
        console.error("[TIMING] ================================\n");
    }
}

export default Logger;
