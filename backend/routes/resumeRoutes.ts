import express from 'express';
import type { Router } from 'express';
import * as resumeController from '../controllers/resumeController';
import { authenticateToken } from '../middleware/auth';
import type { OptimizationService } from '../services/optimizationService';

export function createResumeRoutes(optimizationService: OptimizationService): Router {
    const router = express.Router();

    // 可选的令牌验证，没有令牌时按访客处理
    router.use(authenticateToken);

    // 上传简历
    router.post('/upload', resumeController.uploadResume);

    // 获取简历列表
    router.get('/list', resumeController.getResumes);

    // 优化简历
    router.post('/:id/optimize', resumeController.optimizeResume(optimizationService));

    // 下载简历文件
    router.get('/:id/download', resumeController.downloadResume);

    // 获取简历详情
    router.get('/:id', resumeController.getResumeById);

    // 删除简历
    router.delete('/:id', resumeController.deleteResume);

    return router;
}

export default createResumeRoutes;
