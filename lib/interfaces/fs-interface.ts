import * as fs from 'fs';

/**
 * File system abstraction interface for testability
 */
export interface IFileSystem {
    existsSync(path: string): boolean;
    mkdirSync(path: string, options?: { recursive?: boolean }): void;
    writeFileSync(path: string, data: Uint8Array): void;
}

/**
 * Default implementation using Node.js fs module
 */
export class NodeFileSystem implements IFileSystem {
    existsSync(path: string): boolean {
        return fs.existsSync(path);
    }

    mkdirSync(path: string, options?: { recursive?: boolean }): void {
        fs.mkdirSync(path, options);
    }

    writeFileSync(path: string, data: Uint8Array): void {
        fs.writeFileSync(path, data);
    }
}
