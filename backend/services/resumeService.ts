import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { FilterQuery } from 'mongoose';
import Resume, { ResumeStatus } from '../models/Resume';
import type { ResumeDocument, ResumeRecord } from '../models/Resume';
import { logger } from '../utils/logger';
import { config } from '../config/app';
import { ApplicationError } from '../middleware/errorHandler';
import { ErrorCodes } from '../utils/apiResponse';

export interface ResumeUploadOptions {
    originalName: string;
    size: number;
    buffer: Buffer;
    userId: string;
    jobDescription?: string;
}

export interface ResumeQueryOptions {
    userId?: string;
    status?: ResumeStatus;
    skip?: number;
    limit?: number;
}

export interface OptimizationOutcome {
    optimizedPath: string;
    pdfPath?: string;
    keywordsAdded: number;
    insertedKeywords: string[];
}

export interface ResumeList {
    resumes: ResumeDocument[];
    total: number;
    page: number;
    limit: number;
    totalPages: number;
}

function resumeNotFound(): ApplicationError {
    return new ApplicationError(ErrorCodes.RESUME_NOT_FOUND, '找不到指定的简历', 404);
}

export class ResumeService {
    /**
     * 上传简历：先创建 pending 记录，文件写入成功后标记为 uploaded
     */
    static async uploadResume(options: ResumeUploadOptions): Promise<ResumeDocument> {
        const extension = path.extname(options.originalName).toLowerCase();
        if (!config.upload.allowedExtensions.includes(extension)) {
            throw new ApplicationError(
                ErrorCodes.UNSUPPORTED_FILE_TYPE,
                '只支持 .docx 格式的简历',
                400,
                { extension }
            );
        }

        if (options.size > config.upload.maxFileSize) {
            throw new ApplicationError(
                ErrorCodes.FILE_TOO_LARGE,
                `文件大小超出限制，最大支持${config.upload.maxFileSize / (1024 * 1024)}MB`,
                400
            );
        }

        const fileName = this.generateFileName(options.originalName);
        const originalPath = path.join(config.upload.directory, fileName);

        const resume = await Resume.create({
            userId: options.userId,
            originalName: options.originalName,
            originalPath,
            jobDescription: options.jobDescription,
            status: ResumeStatus.PENDING
        });

        try {
            await fs.promises.mkdir(config.upload.directory, { recursive: true });
            await fs.promises.writeFile(originalPath, options.buffer);
        } catch (error) {
            logger.error('保存简历文件失败', { resumeId: String(resume._id), error });
            await Resume.deleteOne({ _id: resume._id });
            throw new ApplicationError(ErrorCodes.RESUME_UPLOAD_FAILED, '简历上传失败', 500);
        }

        resume.status = ResumeStatus.UPLOADED;
        await resume.save();

        logger.info('简历上传成功', {
            resumeId: String(resume._id),
            userId: options.userId,
            fileName
        });

        return resume;
    }

    /**
     * 获取简历列表
     */
    static async getResumes(options: ResumeQueryOptions = {}): Promise<ResumeList> {
        const {
            userId,
            status,
            skip = 0,
            limit = 10
        } = options;

        const query: FilterQuery<ResumeRecord> = {};

        if (userId) {
            query.userId = userId;
        }

        if (status) {
            query.status = status;
        }

        const total = await Resume.countDocuments(query);
        const resumes = await Resume.find(query)
            .sort({ createdAt: -1 })
            .skip(skip)
            .limit(limit);

        return {
            resumes,
            total,
            page: Math.floor(skip / limit) + 1,
            limit,
            totalPages: Math.ceil(total / limit)
        };
    }

    /**
     * 获取简历详情
     */
    static async getResumeById(resumeId: string, userId?: string): Promise<ResumeDocument> {
        const query: FilterQuery<ResumeRecord> = { _id: resumeId };

        if (userId) {
            query.userId = userId;
        }

        const resume = await Resume.findOne(query);
        if (!resume) {
            throw resumeNotFound();
        }
        return resume;
    }

    /**
     * 开始优化前记录职位描述并标记为处理中，同时清除上一次的错误信息
     */
    static async markProcessing(resumeId: string, jobDescription: string): Promise<ResumeDocument> {
        const resume = await Resume.findById(resumeId);
        if (!resume) {
            throw resumeNotFound();
        }

        resume.status = ResumeStatus.PROCESSING;
        resume.jobDescription = jobDescription;
        resume.error = undefined;
        await resume.save();

        logger.info('简历开始优化', { resumeId });
        return resume;
    }

    static async recordOptimizationResult(resumeId: string, outcome: OptimizationOutcome): Promise<ResumeDocument> {
        const resume = await Resume.findById(resumeId);
        if (!resume) {
            throw resumeNotFound();
        }

        resume.status = ResumeStatus.COMPLETED;
        resume.optimizedPath = outcome.optimizedPath;
        resume.pdfPath = outcome.pdfPath;
        resume.keywordsAdded = outcome.keywordsAdded;
        resume.insertedKeywords = outcome.insertedKeywords;
        resume.error = undefined;
        await resume.save();

        logger.info('简历优化结果已保存', { resumeId, keywordsAdded: outcome.keywordsAdded });
        return resume;
    }

    /**
     * 更新简历状态
     */
    static async updateResumeStatus(
        resumeId: string,
        status: ResumeStatus,
        error?: string
    ): Promise<ResumeDocument> {
        const resume = await Resume.findById(resumeId);
        if (!resume) {
            throw resumeNotFound();
        }

        resume.status = status;
        if (error) {
            resume.error = error;
        }
        await resume.save();

        logger.info('简历状态已更新', { resumeId, status, error });
        return resume;
    }

    /**
     * 删除简历记录以及原始文件和生成的文件
     */
    static async deleteResume(resumeId: string, userId?: string): Promise<void> {
        const resume = await this.getResumeById(resumeId, userId);

        const files = [resume.originalPath, resume.optimizedPath, resume.pdfPath]
            .filter((filePath): filePath is string => Boolean(filePath));

        for (const filePath of files) {
            try {
                await fs.promises.rm(filePath, { force: true });
            } catch (error) {
                logger.warn('删除简历文件失败', { resumeId, filePath, error });
            }
        }

        await Resume.deleteOne({ _id: resume._id });
        logger.info('简历已删除', { resumeId });
    }

    /**
     * 生成唯一的文件名
     */
    private static generateFileName(originalName: string): string {
        const fileExt = path.extname(originalName).toLowerCase();
        return `${uuidv4()}-${Date.now()}${fileExt}`;
    }
}
