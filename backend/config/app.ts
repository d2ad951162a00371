import path from 'path';
import dotenv from 'dotenv';

// 加载环境变量
dotenv.config();

function readInt(value: string | undefined, fallback: number): number {
    const parsed = parseInt(value || '', 10);
    return Number.isNaN(parsed) ? fallback : parsed;
}

function readFloat(value: string | undefined, fallback: number): number {
    const parsed = parseFloat(value || '');
    return Number.isNaN(parsed) ? fallback : parsed;
}

// 应用配置
export const config = {
    // 服务器配置
    server: {
        port: readInt(process.env.PORT, 5000),
        host: process.env.HOST || '127.0.0.1',
        env: process.env.NODE_ENV || 'development',
        isProduction: process.env.NODE_ENV === 'production',
        isDevelopment: process.env.NODE_ENV === 'development',
        isTest: process.env.NODE_ENV === 'test',
    },

    // 文件上传配置
    upload: {
        directory: process.env.UPLOAD_DIR || path.join(process.cwd(), 'uploads'),
        optimizedDirectory: process.env.OPTIMIZED_DIR || path.join(process.cwd(), 'optimized'),
        maxFileSize: readInt(process.env.MAX_FILE_SIZE, 10485760), // 10MB
        allowedExtensions: ['.docx'],
        allowedMimeTypes: [
            'application/vnd.openxmlformats-officedocument.wordprocessingml.document', // DOCX
            'application/octet-stream',
        ],
    },

    // 数据库配置
    database: {
        uri: process.env.MONGODB_URI || 'mongodb://localhost:27017/resume-optimizer',
    },

    // JWT配置
    jwt: {
        secret: process.env.JWT_SECRET || 'change-me-in-production',
    },

    // API限流配置
    rateLimit: {
        windowMs: readInt(process.env.RATE_LIMIT_WINDOW, 900000), // 15分钟
        max: readInt(process.env.RATE_LIMIT_MAX, 100),
    },

    // 日志配置
    logging: {
        directory: process.env.LOG_DIR || path.join(process.cwd(), 'logs'),
        level: process.env.LOG_LEVEL || 'info',
    },

    // 关键词优化引擎配置
    optimizer: {
        minJobDescriptionLength: readInt(process.env.MIN_JOB_DESCRIPTION_LENGTH, 50),
        maxKeywordsTotal: readInt(process.env.MAX_KEYWORDS_TOTAL, 15),
        densityLimit: readFloat(process.env.KEYWORD_DENSITY_LIMIT, 0.03),
        jobDescriptionTopK: readInt(process.env.JOB_DESCRIPTION_TOP_K, 50),
        resumeTopK: readInt(process.env.RESUME_TOP_K, 30),
        maxCandidateKeywords: readInt(process.env.MAX_CANDIDATE_KEYWORDS, 30),
    },

    // 掩码词预测服务配置（未配置 URL 时不启用）
    prediction: {
        url: process.env.PREDICTION_URL || '',
        apiKey: process.env.PREDICTION_API_KEY || '',
        timeoutMs: readInt(process.env.PREDICTION_TIMEOUT_MS, 5000),
        maskToken: process.env.PREDICTION_MASK_TOKEN || '[MASK]',
        topK: readInt(process.env.PREDICTION_TOP_K, 5),
        cacheSize: readInt(process.env.PREDICTION_CACHE_SIZE, 500),
    },

    // 过期文件清理
    maintenance: {
        maxFileAgeDays: readInt(process.env.MAX_FILE_AGE_DAYS, 7),
    },

    // CORS配置
    cors: {
        origin: process.env.CORS_ORIGIN || 'http://localhost:3000',
        credentials: true,
    }
};

export type AppConfig = typeof config;

export default config;
