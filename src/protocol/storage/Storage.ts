import fs from 'fs';
import path from 'path';
import { logger } from '../utils/logger.js';
import { bigintReplacer } from '../utils/json.js';

const log = logger.child('Storage');

/**
 * JSON snapshot files under the node's data directory.
 */
export class Storage {
    private dataDir: string;
    private statePath: string;

    constructor(dataDir: string, stateFile: string = 'ledger.json') {
        this.dataDir = dataDir;
        this.statePath = path.join(this.dataDir, stateFile);
        this.ensureDirectories();
    }

    private ensureDirectories(): void {
        if (!fs.existsSync(this.dataDir)) {
            fs.mkdirSync(this.dataDir, { recursive: true });
        }
    }

    get location(): string {
        return this.statePath;
    }

    saveState(data: unknown): void {
        const tmpPath = `${this.statePath}.tmp`;
        fs.writeFileSync(tmpPath, JSON.stringify(data, bigintReplacer, 2));
        fs.renameSync(tmpPath, this.statePath);
        log.debug('💾 Ledger saved to disk');
    }

    /** Parsed snapshot, or null when none exists. Corrupt files throw. */
    loadState(): unknown | null {
        if (!fs.existsSync(this.statePath)) {
            return null;
        }
        const content = fs.readFileSync(this.statePath, 'utf-8');
        try {
            return JSON.parse(content);
        } catch (error) {
            log.error(`Failed to parse ${this.statePath}:`, error);
            throw error;
        }
    }

    clear(): boolean {
        if (fs.existsSync(this.statePath)) {
            fs.unlinkSync(this.statePath);
            return true;
        }
        return false;
    }
}
