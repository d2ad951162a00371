import type { Request, Response, RequestHandler } from 'express';
import multer from 'multer';
import path from 'path';
import fs from 'fs';
import { ResumeService } from '../services/resumeService';
import type { OptimizationService } from '../services/optimizationService';
import { ResumeStatus } from '../models/Resume';
import type { ResumeDocument } from '../models/Resume';
import { createSuccessResponse, ErrorCodes } from '../utils/apiResponse';
import { config } from '../config/app';
import { ApplicationError, asyncHandler } from '../middleware/errorHandler';
import { validateRequest, ValidationPatterns } from '../middleware/validateRequest';
import { resolveUserId } from '../middleware/auth';

// 文件只在内存中停留，由 ResumeService 负责落盘
const upload = multer({
    storage: multer.memoryStorage(),
    fileFilter: (_req, file, cb) => {
        const extension = path.extname(file.originalname).toLowerCase();
        if (!config.upload.allowedExtensions.includes(extension)) {
            cb(new ApplicationError(
                ErrorCodes.UNSUPPORTED_FILE_TYPE,
                `不支持的文件类型：${extension || file.mimetype}，只支持 .docx`,
                400
            ));
            return;
        }
        if (!config.upload.allowedMimeTypes.includes(file.mimetype)) {
            cb(new ApplicationError(
                ErrorCodes.UNSUPPORTED_FILE_TYPE,
                `不支持的文件格式：${file.mimetype}`,
                400,
                { mimeType: file.mimetype }
            ));
            return;
        }
        cb(null, true);
    },
    limits: {
        fileSize: config.upload.maxFileSize
    }
});

const idParams = validateRequest({
    params: {
        id: {
            type: 'string',
            required: true,
            pattern: ValidationPatterns.objectId
        }
    }
});

export type DownloadFormat = 'pdf' | 'docx' | 'original';

const DOWNLOAD_FORMATS: readonly DownloadFormat[] = ['pdf', 'docx', 'original'];

function readString(source: unknown, field: string): string | undefined {
    if (typeof source !== 'object' || source === null) {
        return undefined;
    }
    const value: unknown = Reflect.get(source, field);
    return typeof value === 'string' ? value : undefined;
}

function parseStatus(value: string | undefined): ResumeStatus | undefined {
    return Object.values(ResumeStatus).find(status => status === value);
}

function parseFormat(value: string | undefined): DownloadFormat {
    return DOWNLOAD_FORMATS.find(format => format === value) ?? 'docx';
}

/**
 * 返回给客户端的简历记录，不包含服务器上的文件路径
 */
export function toResumeSummary(resume: ResumeDocument) {
    return {
        resumeId: String(resume._id),
        fileName: resume.originalName,
        status: resume.status,
        keywordsAdded: resume.keywordsAdded,
        insertedKeywords: resume.insertedKeywords,
        error: resume.error,
        hasOptimizedDocx: Boolean(resume.optimizedPath),
        hasPdf: Boolean(resume.pdfPath),
        createdAt: resume.createdAt,
        updatedAt: resume.updatedAt
    };
}

/**
 * 根据下载格式选择文件路径和下载文件名
 */
export function resolveDownload(resume: ResumeDocument, format: DownloadFormat): { filePath: string; fileName: string } {
    const baseName = path.parse(resume.originalName).name;

    if (format === 'original') {
        return { filePath: resume.originalPath, fileName: resume.originalName };
    }

    const filePath = format === 'pdf' ? resume.pdfPath : resume.optimizedPath;
    if (!filePath) {
        throw new ApplicationError(
            ErrorCodes.RESUME_NOT_OPTIMIZED,
            format === 'pdf' ? '该简历没有可下载的PDF文件' : '该简历尚未完成优化',
            404,
            { status: resume.status }
        );
    }

    return { filePath, fileName: `${baseName}_optimized.${format}` };
}

/**
 * 上传简历
 */
export const uploadResume: RequestHandler[] = [
    upload.single('resume'),

    validateRequest({
        body: {
            jobDescription: {
                type: 'string',
                required: false
            },
            userId: {
                type: 'string',
                required: false
            }
        }
    }),

    asyncHandler(async (req: Request, res: Response) => {
        if (!req.file) {
            throw new ApplicationError(ErrorCodes.BAD_REQUEST, '没有上传文件', 400);
        }

        const resume = await ResumeService.uploadResume({
            originalName: req.file.originalname,
            size: req.file.size,
            buffer: req.file.buffer,
            userId: resolveUserId(req),
            jobDescription: readString(req.body, 'jobDescription')
        });

        return res.status(201).json(
            createSuccessResponse({
                resumeId: String(resume._id),
                fileName: resume.originalName,
                status: resume.status
            })
        );
    })
];

/**
 * 优化简历。优化服务在启动时创建，通过参数注入
 */
export function optimizeResume(service: OptimizationService): RequestHandler[] {
    return [
        idParams,

        validateRequest({
            body: {
                jobDescription: {
                    type: 'string',
                    required: true
                },
                userId: {
                    type: 'string',
                    required: false
                }
            }
        }),

        asyncHandler(async (req: Request, res: Response) => {
            const summary = await service.optimizeResume(
                req.params.id,
                readString(req.body, 'jobDescription') ?? '',
                resolveUserId(req)
            );

            return res.json(createSuccessResponse(summary));
        })
    ];
}

/**
 * 获取简历列表
 */
export const getResumes: RequestHandler[] = [
    validateRequest({
        query: {
            page: {
                type: 'number',
                required: false,
                min: 1
            },
            limit: {
                type: 'number',
                required: false,
                min: 1,
                max: 100
            },
            status: {
                type: 'string',
                required: false,
                enum: Object.values(ResumeStatus)
            }
        }
    }),

    asyncHandler(async (req: Request, res: Response) => {
        const page = parseInt(readString(req.query, 'page') ?? '', 10) || 1;
        const limit = parseInt(readString(req.query, 'limit') ?? '', 10) || 10;

        const result = await ResumeService.getResumes({
            userId: resolveUserId(req),
            status: parseStatus(readString(req.query, 'status')),
            skip: (page - 1) * limit,
            limit
        });

        return res.json(
            createSuccessResponse(
                result.resumes.map(toResumeSummary),
                {
                    pagination: {
                        page: result.page,
                        limit: result.limit,
                        total: result.total,
                        totalPages: result.totalPages
                    }
                }
            )
        );
    })
];

/**
 * 获取简历详情（处理状态）
 */
export const getResumeById: RequestHandler[] = [
    idParams,

    asyncHandler(async (req: Request, res: Response) => {
        const resume = await ResumeService.getResumeById(req.params.id, resolveUserId(req));
        return res.json(createSuccessResponse(toResumeSummary(resume)));
    })
];

/**
 * 下载简历文件：format=pdf|docx|original，默认下载优化后的 .docx
 */
export const downloadResume: RequestHandler[] = [
    idParams,

    validateRequest({
        query: {
            format: {
                type: 'string',
                required: false,
                enum: DOWNLOAD_FORMATS
            }
        }
    }),

    asyncHandler(async (req: Request, res: Response) => {
        const resume = await ResumeService.getResumeById(req.params.id, resolveUserId(req));
        const { filePath, fileName } = resolveDownload(resume, parseFormat(readString(req.query, 'format')));

        try {
            await fs.promises.access(filePath);
        } catch {
            throw new ApplicationError(ErrorCodes.NOT_FOUND, '简历文件不存在', 404);
        }

        await new Promise<void>((resolve, reject) => {
            res.download(filePath, fileName, error => (error ? reject(error) : resolve()));
        });
    })
];

/**
 * 删除简历
 */
export const deleteResume: RequestHandler[] = [
    idParams,

    asyncHandler(async (req: Request, res: Response) => {
        await ResumeService.deleteResume(req.params.id, resolveUserId(req));

        return res.json(
            createSuccessResponse({
                message: '简历已成功删除'
            })
        );
    })
];
