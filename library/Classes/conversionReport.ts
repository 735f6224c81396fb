/**
 * Running counters of a conversion, read by the caller once the run returns.
 */
interface AssetProblem {
    path: string;
    message: string;
}

class ConversionReport {
    private counters = { filesScanned: 0, filesRewritten: 0, variantsGenerated: 0, filesSkipped: 0 };
    private readonly problemList: AssetProblem[] = [];
    private readonly warningList: string[] = [];
    private frozen = false;

    public get filesScanned(): number {
        return this.counters.filesScanned;
    }

    public get filesRewritten(): number {
        return this.counters.filesRewritten;
    }

    public get variantsGenerated(): number {
        return this.counters.variantsGenerated;
    }

    public get filesSkipped(): number {
        return this.counters.filesSkipped;
    }

    public get problems(): readonly AssetProblem[] {
        return this.problemList;
    }

    public get warnings(): readonly string[] {
        return this.warningList;
    }

    public scanned(): void {
        this.assertOpen();
        this.counters.filesScanned++;
    }

    public rewritten(count = 1): void {
        this.assertOpen();
        this.counters.filesRewritten += count;
    }

    public variants(count: number): void {
        this.assertOpen();
        this.counters.variantsGenerated += count;
    }

    public skipped(): void {
        this.assertOpen();
        this.counters.filesSkipped++;
    }

    // Recoverable per-asset problem, e.g. malformed JSON.
    public problem(path: string, message: string): void {
        this.assertOpen();
        this.problemList.push({ path, message });
    }

    public warn(message: string): void {
        this.assertOpen();
        this.warningList.push(message);
    }

    public freeze(): this {
        this.frozen = true;
        Object.freeze(this.counters);
        Object.freeze(this.problemList);
        Object.freeze(this.warningList);
        return this;
    }

    private assertOpen(): void {
        if (this.frozen) throw new Error("ConversionReport is read-only after the run has finished.");
    }
}

export { ConversionReport };
export type { AssetProblem };
