import fs from 'fs';
import path from 'path';
import type { Request, Response } from 'express';
import { config } from '../config/app';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40
};

interface RequestInfo {
    method: string;
    path: string;
    status: number;
    responseTime: number;
    userAgent?: string;
    ip?: string;
}

function isLogLevel(value: string): value is LogLevel {
    return value in LEVEL_PRIORITY;
}

// Error 对象的属性不可枚举，需要单独展开
function serializeMeta(meta: unknown): unknown {
    if (meta instanceof Error) {
        return { name: meta.name, message: meta.message, stack: meta.stack };
    }
    if (meta && typeof meta === 'object' && !Array.isArray(meta)) {
        const result: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(meta)) {
            result[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
        }
        return result;
    }
    return meta;
}

export class Logger {
    private logDir: string;
    private logFile: string;
    private minLevel: LogLevel;
    private writeFiles: boolean;
    private debugMode: boolean;

    constructor(options: { directory: string; level: string; writeFiles: boolean; debugMode: boolean }) {
        this.logDir = options.directory;
        this.logFile = path.join(this.logDir, 'app.log');
        this.minLevel = isLogLevel(options.level) ? options.level : 'info';
        this.writeFiles = options.writeFiles;
        this.debugMode = options.debugMode;

        // 确保日志目录存在
        if (this.writeFiles) {
            this.ensureLogDir();
        }
    }

    private ensureLogDir(): void {
        if (!fs.existsSync(this.logDir)) {
            fs.mkdirSync(this.logDir, { recursive: true });
        }
    }

    private formatMessage(level: LogLevel, message: string, meta?: unknown): string {
        const timestamp = new Date().toISOString();
        let logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}`;

        if (meta !== undefined) {
            try {
                logMessage += ` ${JSON.stringify(serializeMeta(meta))}`;
            } catch (error) {
                logMessage += ` [Meta serialization failed: ${String(error)}]`;
            }
        }

        return logMessage;
    }

    private write(level: LogLevel, message: string, meta?: unknown): void {
        if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.minLevel]) {
            return;
        }

        const formattedMessage = this.formatMessage(level, message, meta);
        switch (level) {
            case 'debug':
                console.debug(formattedMessage);
                break;
            case 'info':
                console.info(formattedMessage);
                break;
            case 'warn':
                console.warn(formattedMessage);
                break;
            default:
                console.error(formattedMessage);
        }

        if (this.writeFiles) {
            fs.appendFileSync(this.logFile, formattedMessage + '\n');
        }
    }

    debug(message: string, meta?: unknown): void {
        this.write('debug', message, meta);
    }

    info(message: string, meta?: unknown): void {
        this.write('info', message, meta);
    }

    warn(message: string, meta?: unknown): void {
        this.write('warn', message, meta);
    }

    error(message: string, meta?: unknown): void {
        this.write('error', message, meta);
    }

    // 用于记录API请求信息
    logRequest(req: Request, res: Response, responseTime: number): void {
        const logData: RequestInfo = {
            method: req.method,
            path: req.path,
            status: res.statusCode,
            responseTime,
            userAgent: req.headers['user-agent'],
            ip: req.ip
        };

        this.info(`HTTP ${req.method} ${req.path} ${res.statusCode}`, logData);
    }

    // 用于记录错误请求
    logErrorRequest(req: Request, error: Error): void {
        const logData = {
            method: req.method,
            path: req.path,
            error: error.message,
            stack: this.debugMode ? error.stack : undefined,
            userAgent: req.headers['user-agent'],
            ip: req.ip
        };

        this.error(`HTTP ${req.method} ${req.path} 失败`, logData);
    }
}

// 导出单例
export const logger = new Logger({
    directory: config.logging.directory,
    level: config.server.isTest ? 'error' : config.logging.level,
    writeFiles: !config.server.isTest,
    debugMode: !config.server.isProduction
});
