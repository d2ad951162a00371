export interface ApiResponse<T> {
    success: boolean;
    data?: T;
    error?: {
        code: string;
        message: string;
        details?: unknown;
    };
    meta?: {
        version: string;
        timestamp: number;
        pagination?: {
            page: number;
            limit: number;
            total: number;
            totalPages: number;
        };
    };
}

export function createSuccessResponse<T>(data: T, meta?: Partial<NonNullable<ApiResponse<T>['meta']>>): ApiResponse<T> {
    return {
        success: true,
        data,
        meta: {
            version: '1.0',
            timestamp: Date.now(),
            ...meta
        }
    };
}

export function createErrorResponse(
    code: string,
    message: string,
    details?: unknown
): ApiResponse<never> {
    return {
        success: false,
        error: {
            code,
            message,
            details
        },
        meta: {
            version: '1.0',
            timestamp: Date.now()
        }
    };
}

// 错误代码常量
export const ErrorCodes = {
    BAD_REQUEST: 'BAD_REQUEST',
    NOT_FOUND: 'NOT_FOUND',
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    SERVER_ERROR: 'SERVER_ERROR',
    RATE_LIMIT_EXCEEDED: 'RATE_LIMIT_EXCEEDED',
    RESUME_NOT_FOUND: 'RESUME_NOT_FOUND',
    RESUME_UPLOAD_FAILED: 'RESUME_UPLOAD_FAILED',
    RESUME_NOT_OPTIMIZED: 'RESUME_NOT_OPTIMIZED',
    FILE_TOO_LARGE: 'FILE_TOO_LARGE',
    UNSUPPORTED_FILE_TYPE: 'UNSUPPORTED_FILE_TYPE',
    INPUT_ERROR: 'INPUT_ERROR',
    OUTPUT_ERROR: 'OUTPUT_ERROR',
    ENHANCEMENT_FAILED: 'ENHANCEMENT_FAILED'
} as const;
