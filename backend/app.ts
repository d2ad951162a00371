import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';

import { config } from './config/app';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { createErrorResponse, createSuccessResponse, ErrorCodes } from './utils/apiResponse';
import { createResumeRoutes } from './routes/resumeRoutes';
import { OptimizationService } from './services/optimizationService';
import { NullTokenPredictor } from './services/optimizer';

export interface AppDependencies {
    optimizationService?: OptimizationService;
}

/**
 * 创建Express应用。优化服务由调用方注入，未提供时使用不调用预测服务的默认实例
 */
export function createApp(deps: AppDependencies = {}): Express {
    const optimizationService = deps.optimizationService ?? new OptimizationService(new NullTokenPredictor());

    const app = express();

    // 设置全局中间件
    app.use(cors(config.cors));
    app.use(helmet());
    app.use(express.json({ limit: '1mb' }));
    app.use(express.urlencoded({ extended: true }));

    // 请求日志
    if (config.server.isDevelopment) {
        app.use(morgan('dev'));
    }
    app.use(requestLogger);

    // 限制请求速率
    app.use(rateLimit({
        windowMs: config.rateLimit.windowMs,
        max: config.rateLimit.max,
        standardHeaders: true,
        legacyHeaders: false,
        message: createErrorResponse(ErrorCodes.RATE_LIMIT_EXCEEDED, '请求频率过高，请稍后再试')
    }));

    // 注册路由
    app.use('/api/resume', createResumeRoutes(optimizationService));

    // 健康检查端点
    app.get('/api/health', (_req, res) => {
        res.json(createSuccessResponse({
            status: 'OK',
            timestamp: new Date(),
            uptime: process.uptime()
        }));
    });

    // 处理404错误
    app.use(notFoundHandler);

    // 全局错误处理
    app.use(errorHandler);

    return app;
}

export default createApp;
