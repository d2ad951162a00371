import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { config } from '../config/app';
import { logger } from '../utils/logger';
import { EnhancementFailure } from './optimizer/errors';
import { NullTokenPredictor } from './optimizer/resumeOptimizer';
import { MASK_PLACEHOLDER } from './optimizer/types';
import type { TokenPredictor } from './optimizer/types';

export interface PredictionSettings {
    url: string;
    apiKey: string;
    timeoutMs: number;
    maskToken: string;
    topK: number;
    cacheSize: number;
}

interface FillMaskCandidate {
    token_str: string;
    score?: number;
}

function isFillMaskCandidate(value: unknown): value is FillMaskCandidate {
    return typeof value === 'object' &&
        value !== null &&
        'token_str' in value &&
        typeof value.token_str === 'string';
}

/**
 * 调用 fill-mask 推理接口（请求体 { inputs, parameters: { top_k } }）的预测客户端。
 * 结果按上下文缓存，容量满时淘汰最久未使用的条目
 */
export class HttpTokenPredictor implements TokenPredictor {
    private readonly cache = new Map<string, string[]>();
    private readonly client: AxiosInstance;

    constructor(private readonly settings: PredictionSettings, client?: AxiosInstance) {
        this.client = client ?? axios.create({ timeout: settings.timeoutMs });
    }

    async predict(maskedContext: string): Promise<string[]> {
        const cached = this.cache.get(maskedContext);
        if (cached) {
            this.cache.delete(maskedContext);
            this.cache.set(maskedContext, cached);
            return cached;
        }

        const inputs = maskedContext.split(MASK_PLACEHOLDER).join(this.settings.maskToken);

        let data: unknown;
        try {
            const response = await this.client.post<unknown>(
                this.settings.url,
                { inputs, parameters: { top_k: this.settings.topK } },
                {
                    timeout: this.settings.timeoutMs,
                    headers: {
                        'Content-Type': 'application/json',
                        ...(this.settings.apiKey ? { Authorization: `Bearer ${this.settings.apiKey}` } : {})
                    }
                }
            );
            data = response.data;
        } catch (error) {
            const message = axios.isAxiosError(error) ? error.message : String(error);
            throw new EnhancementFailure(`预测服务调用失败: ${message}`);
        }

        const predictions = this.parsePredictions(data);
        this.remember(maskedContext, predictions);
        return predictions;
    }

    private parsePredictions(data: unknown): string[] {
        // 多个掩码时接口返回二维数组，这里只取第一个掩码位置
        const rows: unknown = Array.isArray(data) && Array.isArray(data[0]) ? data[0] : data;
        if (!Array.isArray(rows)) {
            logger.warn('预测服务返回了无法识别的结果');
            return [];
        }

        return rows
            .filter(isFillMaskCandidate)
            .map(candidate => candidate.token_str.replace(/##/g, '').trim())
            .filter(token => token.length > 0);
    }

    private remember(key: string, predictions: string[]): void {
        if (this.settings.cacheSize <= 0) {
            return;
        }
        this.cache.set(key, predictions);
        if (this.cache.size > this.settings.cacheSize) {
            const oldest = this.cache.keys().next();
            if (!oldest.done) {
                this.cache.delete(oldest.value);
            }
        }
    }
}

/**
 * 启动时创建一次，注入到优化服务中。未配置 URL 时返回空预测器
 */
export function createTokenPredictor(settings: PredictionSettings = config.prediction): TokenPredictor {
    if (!settings.url) {
        logger.info('未配置预测服务，使用模板插入');
        return new NullTokenPredictor();
    }

    logger.info('已启用预测服务', { url: settings.url, timeoutMs: settings.timeoutMs });
    return new HttpTokenPredictor(settings);
}
