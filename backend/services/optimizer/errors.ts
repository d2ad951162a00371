import { ApplicationError } from '../../middleware/errorHandler';
import { ErrorCodes } from '../../utils/apiResponse';

/**
 * 输入无效：源文档缺失或不可读、职位描述过短、简历内容为空。
 * 立即返回给调用方，不产生任何输出
 */
export class InputError extends ApplicationError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.INPUT_ERROR, message, 400, details);
        this.name = 'InputError';
        Object.setPrototypeOf(this, InputError.prototype);
    }
}

/**
 * 优化结果无法写入目标路径，原始文件保持不变
 */
export class OutputError extends ApplicationError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.OUTPUT_ERROR, message, 500, details);
        this.name = 'OutputError';
        Object.setPrototypeOf(this, OutputError.prototype);
    }
}

/**
 * 预测服务调用失败或超时。只在单次增强内部捕获，随后回退到模板
 */
export class EnhancementFailure extends ApplicationError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.ENHANCEMENT_FAILED, message, 502, details);
        this.name = 'EnhancementFailure';
        Object.setPrototypeOf(this, EnhancementFailure.prototype);
    }
}
