import * as path from 'path';
import { AxiosFetchEngine, NodeFileSystem, IFileSystem } from './interfaces';
import { Loader } from './loader';
import { FetchCommandOptions, LoadResult } from './models';
import { CliProgressBarFactory, formatBytes } from './ui';

/**
 * Writes a payload to disk, creating the parent directory when missing
 */
function savePayload(outputPath: string, data: Buffer, fileSystem: IFileSystem): void {
    const dir = path.dirname(outputPath);
    if (!fileSystem.existsSync(dir)) {
        fileSystem.mkdirSync(dir, { recursive: true });
    }
    fileSystem.writeFileSync(outputPath, data);
}

/**
 * Fetches a URL and reports the outcome
 */
export async function fetchResource(
    target: string,
    options: FetchCommandOptions = {},
): Promise<LoadResult | undefined> {
    const {
        outputPath,
        showBody = false,
        fileSystem = new NodeFileSystem(),
        progressBarFactory = new CliProgressBarFactory(),
    } = options;

    let url: URL;
    try {
        url = new URL(target);
    } catch {
        console.error(`Invalid URL: ${target}`);
        return undefined;
    }

    const progressBar = progressBarFactory.create(url.host);
    const loader = options.loader ?? new Loader(new AxiosFetchEngine({
        onProgress: (progress) => progressBar.report(progress),
    }));

    let result: LoadResult;
    try {
        result = await loader.loadAsync(url);
    } finally {
        progressBar.stop();
    }

    if (result.kind === 'error') {
        console.error(`✗ ${url.href}: ${result.error.message}`);
        return result;
    }

    console.log(`✓ ${url.href}: ${formatBytes(result.data.length)}`);

    if (showBody) {
        console.log(result.data.toString('utf8'));
    }

    if (outputPath) {
        try {
            savePayload(outputPath, result.data, fileSystem);
            console.log(`Saved to ${outputPath}`);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`Failed to save ${outputPath}: ${message}`);
        }
    }

    return result;
}
