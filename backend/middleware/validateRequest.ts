import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { createErrorResponse, ErrorCodes } from '../utils/apiResponse';
import { logger } from '../utils/logger';

type FieldType = 'string' | 'number' | 'boolean';

interface FieldRule {
    type: FieldType;
    required?: boolean;
    min?: number;
    max?: number;
    pattern?: RegExp;
    enum?: readonly string[];
}

// 验证规则类型定义
export interface ValidationSchema {
    [key: string]: FieldRule;
}

// 验证错误格式
interface ValidationErrors {
    [key: string]: string;
}

/**
 * 请求验证中间件
 * 验证请求的参数、查询和请求体是否符合指定的Schema
 */
export function validateRequest(schema: {
    params?: ValidationSchema;
    query?: ValidationSchema;
    body?: ValidationSchema;
}): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        const errors: ValidationErrors = {};

        if (schema.params) {
            Object.assign(errors, validate(req.params, schema.params));
        }

        if (schema.query) {
            Object.assign(errors, validate(req.query, schema.query));
        }

        if (schema.body) {
            Object.assign(errors, validate(req.body, schema.body));
        }

        if (Object.keys(errors).length > 0) {
            logger.warn('请求验证失败', {
                method: req.method,
                path: req.path,
                errors
            });

            res.status(400).json(
                createErrorResponse(
                    ErrorCodes.VALIDATION_ERROR,
                    '请求参数验证失败',
                    errors
                )
            );
            return;
        }

        next();
    };
}

function fieldOf(data: unknown, field: string): unknown {
    if (typeof data !== 'object' || data === null) {
        return undefined;
    }
    return Object.entries(data).find(([key]) => key === field)?.[1];
}

/**
 * 验证数据是否符合指定的Schema，返回验证错误集合
 */
export function validate(data: unknown, schema: ValidationSchema): ValidationErrors {
    const errors: ValidationErrors = {};

    for (const [field, rules] of Object.entries(schema)) {
        const value = fieldOf(data, field);

        // 检查必填字段
        if (rules.required && (value === undefined || value === null || value === '')) {
            errors[field] = `${field} 字段是必填的`;
            continue;
        }

        if (value === undefined || value === null) {
            continue;
        }

        if (!validateType(value, rules.type)) {
            errors[field] = `${field} 字段类型应为 ${rules.type}`;
            continue;
        }

        // 数值范围
        if (rules.type === 'number') {
            const numeric = Number(value);
            if (rules.min !== undefined && numeric < rules.min) {
                errors[field] = `${field} 不能小于 ${rules.min}`;
                continue;
            }
            if (rules.max !== undefined && numeric > rules.max) {
                errors[field] = `${field} 不能大于 ${rules.max}`;
                continue;
            }
        }

        // 字符串长度
        if (typeof value === 'string' && rules.type === 'string') {
            const length = value.trim().length;
            if (rules.min !== undefined && length < rules.min) {
                errors[field] = `${field} 长度不能小于 ${rules.min} 个字符`;
                continue;
            }
            if (rules.max !== undefined && length > rules.max) {
                errors[field] = `${field} 长度不能大于 ${rules.max} 个字符`;
                continue;
            }
        }

        if (rules.pattern && !rules.pattern.test(String(value))) {
            errors[field] = `${field} 格式不正确`;
            continue;
        }

        if (rules.enum && rules.enum.length > 0 && !rules.enum.includes(String(value))) {
            errors[field] = `${field} 必须是以下值之一: ${rules.enum.join(', ')}`;
        }
    }

    return errors;
}

/**
 * 验证值的类型是否符合预期。查询参数都是字符串，数字和布尔值按字符串解析
 */
function validateType(value: unknown, type: FieldType): boolean {
    switch (type) {
        case 'string':
            return typeof value === 'string';
        case 'number':
            return (typeof value === 'number' || typeof value === 'string') &&
                String(value).trim() !== '' &&
                !isNaN(Number(value));
        case 'boolean':
            return typeof value === 'boolean' || value === 'true' || value === 'false';
    }
}

// 预定义的验证模式
export const ValidationPatterns = {
    objectId: /^[0-9a-fA-F]{24}$/,
};
