import mongoose, { Schema } from 'mongoose';
import type { HydratedDocument } from 'mongoose';

// 简历处理状态
export enum ResumeStatus {
    PENDING = 'pending',       // 记录已创建，文件尚未保存
    UPLOADED = 'uploaded',     // 已上传，尚未优化
    PROCESSING = 'processing', // 优化中
    COMPLETED = 'completed',   // 优化完成
    FAILED = 'failed'          // 优化失败
}

export interface ResumeRecord {
    userId: string;
    originalName: string;
    originalPath: string;
    optimizedPath?: string;
    pdfPath?: string;
    jobDescription?: string;
    status: ResumeStatus;
    keywordsAdded: number;
    insertedKeywords: string[];
    error?: string;
    createdAt: Date;
    updatedAt: Date;
}

export type ResumeDocument = HydratedDocument<ResumeRecord>;

const ResumeSchema = new Schema<ResumeRecord>({
    userId: {
        type: String,
        required: true,
        default: 'guest'
    },
    originalName: {
        type: String,
        required: true
    },
    originalPath: {
        type: String,
        required: true
    },
    optimizedPath: {
        type: String
    },
    pdfPath: {
        type: String
    },
    jobDescription: {
        type: String
    },
    status: {
        type: String,
        enum: Object.values(ResumeStatus),
        default: ResumeStatus.PENDING
    },
    keywordsAdded: {
        type: Number,
        default: 0,
        min: 0
    },
    insertedKeywords: {
        type: [String],
        default: []
    },
    error: {
        type: String
    }
}, {
    timestamps: true,
    toJSON: {
        virtuals: true,
        versionKey: false
    }
});

ResumeSchema.index({ userId: 1, createdAt: -1 });
ResumeSchema.index({ status: 1 });

const Resume = mongoose.model<ResumeRecord>('Resume', ResumeSchema);

export default Resume;
