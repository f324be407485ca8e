import { FetchProgress } from '../models/fetch';

/**
 * Progress display for one download, abstracted for testability
 */
export interface IProgressBar {
    report(progress: FetchProgress): void;
    stop(): void;
}

export interface IProgressBarFactory {
    create(name: string): IProgressBar;
}
