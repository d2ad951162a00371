import path from 'path';
import { config } from '../config/app';
import { logger } from '../utils/logger';
import { ResumeStatus } from '../models/Resume';
import type { ResumeDocument } from '../models/Resume';
import { ResumeService } from './resumeService';
import { DocumentStore } from './documentStore';
import { PdfRenderer } from './pdfRenderer';
import { InputError, ResumeOptimizer } from './optimizer';
import type { OptimizationResult, OptimizerOptions, TokenPredictor } from './optimizer';

export interface OptimizationSummary {
    resumeId: string;
    status: ResumeStatus;
    keywordsAdded: number;
    insertedKeywords: string[];
    changeLog: string[];
}

export interface OptimizationServiceOptions {
    optimizedDirectory?: string;
    optimizer?: Partial<OptimizerOptions>;
    renderer?: PdfRenderer;
}

/**
 * 一次简历优化的完整流程：读取记录和文档、运行关键词引擎、写出 .docx 与 PDF、保存结果。
 * 任一步骤失败都会把记录标记为 failed，原始文件不会被修改
 */
export class OptimizationService {
    private readonly optimizer: ResumeOptimizer;
    private readonly renderer: PdfRenderer;
    private readonly optimizedDirectory: string;

    constructor(predictor: TokenPredictor, options: OptimizationServiceOptions = {}) {
        this.optimizer = new ResumeOptimizer(predictor, { ...config.optimizer, ...options.optimizer });
        this.renderer = options.renderer ?? new PdfRenderer();
        this.optimizedDirectory = options.optimizedDirectory ?? config.upload.optimizedDirectory;
    }

    async optimizeResume(resumeId: string, jobDescription: string, userId?: string): Promise<OptimizationSummary> {
        const resume = await ResumeService.getResumeById(resumeId, userId);

        // 职位描述无效时不改变记录状态
        const minLength = config.optimizer.minJobDescriptionLength;
        if (jobDescription.trim().length < minLength) {
            throw new InputError(`职位描述过短，至少需要${minLength}个字符`, {
                length: jobDescription.trim().length
            });
        }

        await ResumeService.markProcessing(resumeId, jobDescription);

        try {
            const result = await this.run(resume, jobDescription);
            const outputs = await this.writeOutputs(resumeId, result);
            const insertedKeywords = result.insertions.map(insertion => insertion.keyword);

            const updated = await ResumeService.recordOptimizationResult(resumeId, {
                ...outputs,
                keywordsAdded: result.keywordsAdded,
                insertedKeywords
            });

            return {
                resumeId,
                status: updated.status,
                keywordsAdded: result.keywordsAdded,
                insertedKeywords,
                changeLog: result.changeLog
            };
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            logger.error('简历优化失败', { resumeId, error });
            await ResumeService.updateResumeStatus(resumeId, ResumeStatus.FAILED, reason);
            throw error;
        }
    }

    private async run(resume: ResumeDocument, jobDescription: string): Promise<OptimizationResult> {
        const document = await DocumentStore.read(resume.originalPath);
        return this.optimizer.optimize(document, jobDescription);
    }

    private async writeOutputs(resumeId: string, result: OptimizationResult): Promise<{ optimizedPath: string; pdfPath?: string }> {
        const optimizedPath = path.join(this.optimizedDirectory, `${resumeId}_optimized.docx`);
        await DocumentStore.write(result.document, optimizedPath);

        // PDF 只是附带产物，渲染失败不影响 .docx 结果
        const pdfPath = path.join(this.optimizedDirectory, `${resumeId}_optimized.pdf`);
        try {
            await this.renderer.render(result.document, pdfPath);
            return { optimizedPath, pdfPath };
        } catch (error) {
            logger.warn('PDF生成失败，仅保留 .docx 结果', { resumeId, error });
            return { optimizedPath };
        }
    }
}
