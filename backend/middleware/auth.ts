import type { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { config } from '../config/app';
import { logger } from '../utils/logger';

export interface AuthUser {
    id: string;
}

/**
 * 扩展Express Request接口，添加user属性
 */
declare global {
    // eslint-disable-next-line @typescript-eslint/no-namespace
    namespace Express {
        interface Request {
            user?: AuthUser;
        }
    }
}

export const GUEST_USER_ID = 'guest';

/**
 * 验证JWT令牌并将用户信息附加到请求对象。
 * 没有令牌或令牌无效时不阻止请求，按访客处理
 */
export function authenticateToken(req: Request, _res: Response, next: NextFunction): void {
    const authHeader = req.headers.authorization;
    const token = authHeader?.startsWith('Bearer ') ? authHeader.slice(7).trim() : undefined;

    if (!token) {
        next();
        return;
    }

    try {
        const decoded = jwt.verify(token, config.jwt.secret);
        if (typeof decoded === 'object' && typeof decoded.id === 'string' && decoded.id) {
            req.user = { id: decoded.id };
        } else {
            logger.warn('令牌中缺少用户ID');
        }
    } catch (error) {
        logger.warn('无效的令牌', { error: error instanceof Error ? error.message : String(error) });
    }

    next();
}

/**
 * 当前请求的用户ID：令牌中的用户，其次是请求体里的 userId，否则为访客
 */
export function resolveUserId(req: Request): string {
    if (req.user) {
        return req.user.id;
    }
    const body: unknown = req.body;
    if (typeof body === 'object' && body !== null && 'userId' in body &&
        typeof body.userId === 'string' && body.userId.trim()) {
        return body.userId.trim();
    }
    return GUEST_USER_ID;
}
