import * as cliProgress from 'cli-progress';
import { IProgressBar, IProgressBarFactory } from './interfaces/progress-interface';
import { FetchProgress } from './models';

const FETCH_BAR_FORMAT = '{name} |{bar}| {percentage}% | {value}/{total} bytes';

export type ProgressBarRenderer = Pick<cliProgress.SingleBar, 'start' | 'setTotal' | 'update' | 'stop'>;

/**
 * Download progress bar that only draws once the response size is known
 */
export class CliProgressBar implements IProgressBar {
    private started = false;

    constructor(
        private readonly renderer: ProgressBarRenderer,
        private readonly name: string,
    ) {}

    report({ loaded, total }: FetchProgress): void {
        if (total <= 0) {
            return;
        }

        if (!this.started) {
            this.renderer.start(total, loaded, { name: this.name });
            this.started = true;
            return;
        }
        this.renderer.setTotal(total);
        this.renderer.update(loaded);
    }

    stop(): void {
        if (this.started) {
            this.renderer.stop();
            this.started = false;
        }
    }
}

/**
 * Default progress bar factory implementation
 */
export class CliProgressBarFactory implements IProgressBarFactory {
    create(name: string): IProgressBar {
        const bar = new cliProgress.SingleBar({
            format: FETCH_BAR_FORMAT,
            hideCursor: true,
            clearOnComplete: true,
        }, cliProgress.Presets.shades_classic);

        return new CliProgressBar(bar, name);
    }
}

/**
 * Formats a byte count for display, e.g. 1536 -> "1.5 KB"
 */
export function formatBytes(bytes: number): string {
    if (bytes < 1024) {
        return `${bytes} B`;
    }
    if (bytes < 1024 * 1024) {
        return `${(bytes / 1024).toFixed(1)} KB`;
    }
    return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}
