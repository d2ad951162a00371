import type { Server } from 'http';
import { config } from './config/app';
import { connectToDatabase, disconnectFromDatabase } from './config/database';
import { logger } from './utils/logger';
import { setupUncaughtExceptionHandling } from './middleware/errorHandler';
import { createApp } from './app';
import { FileMaintenanceService } from './services/fileMaintenanceService';
import { OptimizationService } from './services/optimizationService';
import { createTokenPredictor } from './services/predictionService';

// 启动服务器
const startServer = async (): Promise<Server> => {
    setupUncaughtExceptionHandling();

    await FileMaintenanceService.runStartupMaintenance();
    await connectToDatabase();

    // 预测服务只创建一次，注入到优化服务中
    const optimizationService = new OptimizationService(createTokenPredictor());
    const app = createApp({ optimizationService });

    const PORT = config.server.port;
    const HOST = config.server.host;

    const server = app.listen(PORT, HOST, () => {
        logger.info('服务器已启动', {
            port: PORT,
            host: HOST,
            env: config.server.env,
            nodeVersion: process.version
        });
    });

    const shutdown = (): void => {
        logger.info('正在关闭服务器...');
        server.close(() => {
            disconnectFromDatabase()
                .then(() => process.exit(0))
                .catch((error: unknown) => {
                    logger.error('关闭数据库连接失败', error);
                    process.exit(1);
                });
        });
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);

    return server;
};

startServer().catch((error: unknown) => {
    logger.error('服务器启动失败', error);
    process.exit(1);
});
