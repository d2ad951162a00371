import fs from 'fs';
import path from 'path';
import { config } from '../config/app';
import { logger } from '../utils/logger';

const DAY_MS = 24 * 60 * 60 * 1000;

export class FileMaintenanceService {
    /**
     * 确保上传、优化结果和日志目录存在
     */
    static async ensureDirectories(
        directories: string[] = [config.upload.directory, config.upload.optimizedDirectory, config.logging.directory]
    ): Promise<void> {
        for (const directory of directories) {
            await fs.promises.mkdir(directory, { recursive: true });
        }
    }

    /**
     * 删除目录中超过指定天数的文件，返回删除的数量
     */
    static async cleanupOldFiles(directory: string, maxAgeDays: number, now: number = Date.now()): Promise<number> {
        let entries: fs.Dirent[];
        try {
            entries = await fs.promises.readdir(directory, { withFileTypes: true });
        } catch (error) {
            logger.warn('无法读取待清理目录', { directory, error });
            return 0;
        }

        const cutoff = now - maxAgeDays * DAY_MS;
        let removed = 0;

        for (const entry of entries) {
            if (!entry.isFile()) {
                continue;
            }
            const filePath = path.join(directory, entry.name);
            try {
                const stats = await fs.promises.stat(filePath);
                if (stats.mtimeMs < cutoff) {
                    await fs.promises.unlink(filePath);
                    removed++;
                }
            } catch (error) {
                logger.warn('删除过期文件失败', { filePath, error });
            }
        }

        if (removed > 0) {
            logger.info('已清理过期文件', { directory, removed });
        }
        return removed;
    }

    /**
     * 启动时执行：创建目录并清理上传及优化目录中的过期文件
     */
    static async runStartupMaintenance(maxAgeDays: number = config.maintenance.maxFileAgeDays): Promise<void> {
        await this.ensureDirectories();
        await this.cleanupOldFiles(config.upload.directory, maxAgeDays);
        await this.cleanupOldFiles(config.upload.optimizedDirectory, maxAgeDays);
    }
}
