import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FileMaintenanceService } from '../backend/services/fileMaintenanceService';

const DAY_MS = 24 * 60 * 60 * 1000;

describe('FileMaintenanceService', () => {
    let workDir: string;

    beforeEach(() => {
        workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'resume-maint-'));
    });

    afterEach(() => {
        fs.rmSync(workDir, { recursive: true, force: true });
    });

    it('creates missing directories', async () => {
        const uploads = path.join(workDir, 'uploads');
        const optimized = path.join(workDir, 'nested', 'optimized');

        await FileMaintenanceService.ensureDirectories([uploads, optimized]);

        expect(fs.statSync(uploads).isDirectory()).toBe(true);
        expect(fs.statSync(optimized).isDirectory()).toBe(true);
    });

    it('removes only files older than the configured age', async () => {
        const now = Date.now();
        const stale = path.join(workDir, 'stale.docx');
        const fresh = path.join(workDir, 'fresh.docx');
        fs.writeFileSync(stale, 'old');
        fs.writeFileSync(fresh, 'new');
        fs.mkdirSync(path.join(workDir, 'subdir'));
        const staleTime = new Date(now - 10 * DAY_MS);
        fs.utimesSync(stale, staleTime, staleTime);

        const removed = await FileMaintenanceService.cleanupOldFiles(workDir, 7, now);

        expect(removed).toBe(1);
        expect(fs.readdirSync(workDir).sort()).toEqual(['fresh.docx', 'subdir']);
    });

    it('returns 0 for a missing directory', async () => {
        await expect(FileMaintenanceService.cleanupOldFiles(path.join(workDir, 'absent'), 7)).resolves.toBe(0);
    });
});
