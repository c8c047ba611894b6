import { formatNumber } from './common.js';

export class ProgressCounter {
    private rowsDone = 0;
    private raysAtLastReport = 0;
    private readonly startTime: number;
    private lastTime: number;
    private readonly totalRows: number;
    private readonly now: () => number;
    private readonly log: (message: string) => void;
    private currentRaysPerSecond = 0;

    constructor(
        totalRows: number,
        now: () => number = () => performance.now(),
        log: (message: string) => void = console.log
    ) {
        this.totalRows = totalRows;
        this.now = now;
        this.log = log;
        this.startTime = now();
        this.lastTime = this.startTime;
    }

    // Call after every finished row with the running ray total
    public updateProgress(totalRays: number): void {
        this.rowsDone++;
        const currentTime = this.now();
        const deltaTime = currentTime - this.lastTime;

        if (deltaTime >= 1000) {
            this.currentRaysPerSecond = Math.round(
                ((totalRays - this.raysAtLastReport) * 1000) / deltaTime
            );
            const percent = Math.floor((this.rowsDone * 100) / this.totalRows);
            this.log(
                `Rendered ${this.rowsDone}/${this.totalRows} rows (${percent}%), ${formatNumber(this.currentRaysPerSecond)} rays/s`
            );
            this.raysAtLastReport = totalRays;
            this.lastTime = currentTime;
        }
    }

    public getRaysPerSecond(): number {
        return this.currentRaysPerSecond;
    }

    public getElapsedSeconds(): number {
        return (this.now() - this.startTime) / 1000;
    }
}
