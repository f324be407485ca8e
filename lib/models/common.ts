import { ILoader } from '../loader';
import { IFileSystem, IProgressBarFactory } from '../interfaces';

/**
 * Options for creating a REPL interface
 */
export type ChatLoopOptions = {
    prompt?: string;
    welcomeMessage?: string;
    onExit?: () => void;
}

/**
 * Options for the fetch command
 */
export type FetchCommandOptions = {
    outputPath?: string;
    showBody?: boolean;
    // Dependency injection for testing
    loader?: ILoader;
    fileSystem?: IFileSystem;
    progressBarFactory?: IProgressBarFactory;
}
