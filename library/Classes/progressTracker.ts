import { CancellationError } from "../Errors/index.ts";
import type { ConversionOptions, ProgressSink } from "../Types/Converter/index.ts";

const SILENT_SINK: ProgressSink = {
    report: () => undefined,
    message: () => undefined,
};

/**
 * Per-phase progress counter. Every checkpoint also polls for cancellation.
 */
class ProgressTracker {
    private completed = 0;
    private total = 0;

    constructor(
        private readonly sink: ProgressSink = SILENT_SINK,
        private readonly isCancelled: () => boolean = () => false,
    ) {}

    public static from(options: ConversionOptions): ProgressTracker {
        return new ProgressTracker(options.progress, options.isCancelled);
    }

    public begin(label: string, total: number): void {
        this.completed = 0;
        this.total = total;
        this.sink.message(label);
    }

    public message(text: string): void {
        this.sink.message(text);
    }

    public checkpoint(): void {
        if (this.isCancelled()) throw new CancellationError();
    }

    public advance(): void {
        this.completed = Math.min(this.completed + 1, this.total);
        this.sink.report(this.completed, this.total);
    }
}

export { ProgressTracker, SILENT_SINK };
