import type { Request, Response, NextFunction, RequestHandler } from 'express';
import multer from 'multer';
import mongoose from 'mongoose';
import { createErrorResponse, ErrorCodes } from '../utils/apiResponse';
import { logger } from '../utils/logger';
import { config } from '../config/app';

export interface AppError extends Error {
    statusCode?: number;
    code?: string;
    details?: unknown;
    isOperational?: boolean;
}

/**
 * 自定义错误类，用于应用程序中抛出操作性错误
 */
export class ApplicationError extends Error implements AppError {
    statusCode: number;
    code: string;
    details?: unknown;
    isOperational: boolean;

    constructor(code: string, message: string, statusCode: number = 400, details?: unknown) {
        super(message);
        this.name = 'ApplicationError';
        this.statusCode = statusCode;
        this.code = code;
        this.details = details;
        this.isOperational = true; // 这是一个可控制的业务错误

        // 设置原型链，以便错误实例正确地被instanceof检测
        Object.setPrototypeOf(this, ApplicationError.prototype);
    }
}

type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

/**
 * 捕获异步路由处理器中的错误
 */
export const asyncHandler = (fn: AsyncRequestHandler): RequestHandler =>
    (req: Request, res: Response, next: NextFunction): void => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };

/**
 * 处理404错误（未找到路由）
 */
export const notFoundHandler = (req: Request, res: Response, next: NextFunction): void => {
    const error = new ApplicationError(
        ErrorCodes.NOT_FOUND,
        `未找到路径: ${req.originalUrl}`,
        404
    );
    next(error);
};

/**
 * 将第三方库抛出的错误转换为统一的应用错误
 */
export function toApplicationError(err: unknown): AppError {
    if (err instanceof ApplicationError) {
        return err;
    }

    if (err instanceof multer.MulterError) {
        if (err.code === 'LIMIT_FILE_SIZE') {
            return new ApplicationError(
                ErrorCodes.FILE_TOO_LARGE,
                `文件大小超出限制，最大支持${config.upload.maxFileSize / (1024 * 1024)}MB`,
                400
            );
        }
        return new ApplicationError(ErrorCodes.BAD_REQUEST, err.message, 400);
    }

    if (err instanceof mongoose.Error.CastError) {
        return new ApplicationError(ErrorCodes.BAD_REQUEST, `无效的参数: ${err.path}`, 400);
    }

    if (err instanceof Error) {
        return err;
    }

    return new Error(String(err));
}

/**
 * 全局错误处理中间件
 */
export const errorHandler = (
    err: unknown,
    req: Request,
    res: Response,
    next: NextFunction
): void => {
    const appError = toApplicationError(err);

    // 设置默认状态码和错误代码
    const statusCode = appError.statusCode || 500;
    const errorCode = appError.code || ErrorCodes.SERVER_ERROR;

    // 记录错误
    if (statusCode >= 500) {
        logger.logErrorRequest(req, appError);
    } else {
        logger.warn('客户端错误', {
            path: req.path,
            method: req.method,
            error: appError.message,
            code: errorCode,
            details: appError.details
        });
    }

    // 响应已开始发送（例如文件下载中断），交给 Express 关闭连接
    if (res.headersSent) {
        next(err);
        return;
    }

    // 发送适当的响应
    res.status(statusCode).json(
        createErrorResponse(
            errorCode,
            appError.message,
            config.server.isDevelopment ? appError.details || appError.stack : appError.details
        )
    );
};

/**
 * 未捕获异常处理
 */
export const setupUncaughtExceptionHandling = (): void => {
    // 处理未捕获的异常
    process.on('uncaughtException', (error: Error) => {
        logger.error('未捕获的异常', { error: error.message, stack: error.stack });

        // 给应用程序一些时间来完成待处理的请求并关闭资源
        setTimeout(() => {
            logger.error('应用程序正在关闭...');
            process.exit(1);
        }, 1000);
    });

    // 处理未处理的Promise拒绝
    process.on('unhandledRejection', (reason: unknown) => {
        logger.error('未处理的Promise拒绝', { reason });

        // 将未处理的拒绝转换为未捕获的异常
        throw reason;
    });
};
