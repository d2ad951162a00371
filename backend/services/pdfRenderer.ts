import fs from 'fs';
import path from 'path';
import { PDFDocument, PageSizes, StandardFonts, rgb } from 'pdf-lib';
import type { PDFFont, PDFPage } from 'pdf-lib';
import { logger } from '../utils/logger';
import { DocumentStore } from './documentStore';
import { OutputError } from './optimizer/errors';
import type { DocumentContent, Paragraph } from './optimizer/types';

export interface RenderStrategy {
    readonly name: string;
    render(document: DocumentContent): Promise<Uint8Array>;
}

const MARGIN = 72; // 1英寸
const BASE_FONT_SIZE = 12;
const LINE_GAP = 2;
const TAB_AS_SPACES = '    ';

const LATIN1_REPLACEMENTS: Record<string, string> = {
    '–': '-',
    '—': '-',
    '‘': "'",
    '’': "'",
    '“': '"',
    '”': '"',
    '•': '-',
    '…': '...'
};

/**
 * 替换常见的排版符号，并去掉标准字体无法编码的字符
 */
export function toLatin1(text: string): string {
    return text
        .replace(/[–—‘’“”•…]/g, char => LATIN1_REPLACEMENTS[char] ?? '')
        .replace(/[^\x20-\x7E\xA0-\xFF]/g, '');
}

function wrapText(text: string, font: PDFFont, size: number, maxWidth: number): string[] {
    const words = text.split(' ').filter(word => word.length > 0);
    const lines: string[] = [];
    let currentLine = '';

    for (const word of words) {
        const testLine = currentLine ? `${currentLine} ${word}` : word;
        if (font.widthOfTextAtSize(testLine, size) > maxWidth && currentLine) {
            lines.push(currentLine);
            currentLine = word;
        } else {
            currentLine = testLine;
        }
    }
    if (currentLine) {
        lines.push(currentLine);
    }
    return lines;
}

interface LayoutOptions {
    useFormatting: boolean;
    sanitize: boolean;
}

async function layoutDocument(document: DocumentContent, options: LayoutOptions): Promise<Uint8Array> {
    const pdf = await PDFDocument.create();
    const regular = await pdf.embedFont(StandardFonts.Helvetica);
    const bold = await pdf.embedFont(StandardFonts.HelveticaBold);
    const [pageWidth, pageHeight] = PageSizes.Letter;
    const maxWidth = pageWidth - MARGIN * 2;

    let page: PDFPage = pdf.addPage(PageSizes.Letter);
    let y = pageHeight - MARGIN;

    const drawParagraph = (paragraph: Paragraph): void => {
        const run = options.useFormatting ? paragraph.formatting.run : undefined;
        const font = run?.bold ? bold : regular;
        const size = run?.fontSize ?? BASE_FONT_SIZE;
        const leading = size + LINE_GAP;
        const raw = paragraph.text.replace(/\t/g, TAB_AS_SPACES);
        const text = options.sanitize ? toLatin1(raw) : raw;
        const lines = text.trim() ? wrapText(text, font, size, maxWidth) : [''];

        for (const line of lines) {
            if (y - leading < MARGIN) {
                page = pdf.addPage(PageSizes.Letter);
                y = pageHeight - MARGIN;
            }
            y -= leading;

            const width = font.widthOfTextAtSize(line, size);
            let x = MARGIN;
            if (options.useFormatting && paragraph.formatting.alignment === 'center') {
                x = MARGIN + (maxWidth - width) / 2;
            } else if (options.useFormatting && paragraph.formatting.alignment === 'right') {
                x = MARGIN + maxWidth - width;
            }

            if (line) {
                page.drawText(line, { x, y, size, font, color: rgb(0, 0, 0) });
            }
        }
    };

    document.paragraphs.forEach(drawParagraph);
    return pdf.save();
}

/**
 * 保留粗体、字号和对齐方式的排版
 */
export class FormattedLayoutStrategy implements RenderStrategy {
    readonly name = 'formatted';

    render(document: DocumentContent): Promise<Uint8Array> {
        return layoutDocument(document, { useFormatting: true, sanitize: false });
    }
}

/**
 * 纯文本排版，去掉标准字体无法编码的字符
 */
export class PlainTextStrategy implements RenderStrategy {
    readonly name = 'plain-text';

    render(document: DocumentContent): Promise<Uint8Array> {
        return layoutDocument(document, { useFormatting: false, sanitize: true });
    }
}

/**
 * 按顺序尝试各渲染策略，第一个成功的结果写入目标路径
 */
export class PdfRenderer {
    constructor(
        private readonly strategies: readonly RenderStrategy[] = [new FormattedLayoutStrategy(), new PlainTextStrategy()]
    ) {}

    async render(document: DocumentContent, outputPath: string): Promise<string> {
        const failures: { strategy: string; error: string }[] = [];

        for (const strategy of this.strategies) {
            let bytes: Uint8Array;
            try {
                bytes = await strategy.render(document);
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                logger.warn('PDF渲染策略失败，尝试下一个', { strategy: strategy.name, error: message });
                failures.push({ strategy: strategy.name, error: message });
                continue;
            }

            try {
                await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
                await fs.promises.writeFile(outputPath, bytes);
            } catch (error) {
                logger.error('写入PDF文件失败', { outputPath, error });
                throw new OutputError('无法写入PDF文件', { outputPath });
            }

            logger.info('PDF已生成', { outputPath, strategy: strategy.name });
            return outputPath;
        }

        throw new OutputError('所有PDF渲染方式均失败', { failures });
    }

    async renderFile(documentPath: string, outputPath: string): Promise<string> {
        const document = await DocumentStore.read(documentPath);
        return this.render(document, outputPath);
    }
}
