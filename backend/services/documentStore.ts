import fs from 'fs';
import path from 'path';
import mammoth from 'mammoth';
import { v4 as uuidv4 } from 'uuid';
import { AlignmentType, Document, HeadingLevel, Packer, Paragraph as DocxParagraph, TextRun } from 'docx';
import { logger } from '../utils/logger';
import { InputError, OutputError } from './optimizer/errors';
import type { Alignment, DocumentContent, Paragraph, ParagraphFormatting, RunFormatting } from './optimizer/types';

type DocxNode = Record<string, unknown>;

function isNode(value: unknown): value is DocxNode {
    return typeof value === 'object' && value !== null;
}

function childrenOf(node: DocxNode): unknown[] {
    const children = node.children;
    return Array.isArray(children) ? children : [];
}

function readString(value: unknown): string | undefined {
    return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function readNumber(value: unknown): number | undefined {
    if (typeof value === 'number' && Number.isFinite(value)) {
        return value;
    }
    if (typeof value === 'string' && value.trim()) {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : undefined;
    }
    return undefined;
}

const ALIGNMENTS: Record<string, Alignment> = {
    left: 'left',
    start: 'left',
    center: 'center',
    right: 'right',
    end: 'right',
    both: 'justify',
    distribute: 'justify'
};

function collectText(node: unknown): string {
    if (!isNode(node)) {
        return '';
    }
    switch (node.type) {
        case 'text':
            return readString(node.value) ?? '';
        case 'tab':
            return '\t';
        case 'break':
            return ' ';
        default:
            return childrenOf(node).map(collectText).join('');
    }
}

function findFirstRun(node: DocxNode): DocxNode | undefined {
    for (const child of childrenOf(node)) {
        if (!isNode(child)) {
            continue;
        }
        if (child.type === 'run' && collectText(child).trim()) {
            return child;
        }
        const nested = findFirstRun(child);
        if (nested) {
            return nested;
        }
    }
    return undefined;
}

function readRunFormatting(run: DocxNode | undefined): RunFormatting | undefined {
    if (!run) {
        return undefined;
    }
    return {
        bold: run.isBold === true,
        italic: run.isItalic === true,
        underline: run.isUnderline === true,
        font: readString(run.font),
        fontSize: readNumber(run.fontSize)
    };
}

function readParagraph(node: DocxNode): Paragraph {
    const formatting: ParagraphFormatting = {
        styleName: readString(node.styleName),
        run: readRunFormatting(findFirstRun(node))
    };

    const alignment = readString(node.alignment);
    if (alignment && ALIGNMENTS[alignment]) {
        formatting.alignment = ALIGNMENTS[alignment];
    }

    const indent = node.indent;
    if (isNode(indent)) {
        formatting.indent = {
            left: readNumber(indent.start),
            right: readNumber(indent.end),
            firstLine: readNumber(indent.firstLine),
            hanging: readNumber(indent.hanging)
        };
    }

    return { text: collectText(node), formatting };
}

// 表格单元格中的段落同样按文档顺序收集
function collectParagraphs(node: unknown, paragraphs: Paragraph[]): void {
    if (!isNode(node)) {
        return;
    }
    if (node.type === 'paragraph') {
        paragraphs.push(readParagraph(node));
        return;
    }
    for (const child of childrenOf(node)) {
        collectParagraphs(child, paragraphs);
    }
}

const DOCX_ALIGNMENT = {
    left: AlignmentType.LEFT,
    center: AlignmentType.CENTER,
    right: AlignmentType.RIGHT,
    justify: AlignmentType.JUSTIFIED
} as const;

const DOCX_HEADINGS: Record<string, (typeof HeadingLevel)[keyof typeof HeadingLevel]> = {
    'heading 1': HeadingLevel.HEADING_1,
    'heading 2': HeadingLevel.HEADING_2,
    'heading 3': HeadingLevel.HEADING_3,
    title: HeadingLevel.TITLE
};

function toDocxParagraph(paragraph: Paragraph): DocxParagraph {
    const { alignment, indent, run, styleName } = paragraph.formatting;

    return new DocxParagraph({
        alignment: alignment ? DOCX_ALIGNMENT[alignment] : undefined,
        heading: styleName ? DOCX_HEADINGS[styleName.toLowerCase()] : undefined,
        indent: indent
            ? {
                left: indent.left,
                right: indent.right,
                firstLine: indent.firstLine,
                hanging: indent.hanging
            }
            : undefined,
        children: [
            new TextRun({
                text: paragraph.text,
                bold: run?.bold,
                italics: run?.italic,
                underline: run?.underline ? {} : undefined,
                font: run?.font,
                size: run?.fontSize ? Math.round(run.fontSize * 2) : undefined // 半磅
            })
        ]
    });
}

/**
 * .docx 简历的读写。读取得到段落文本及格式属性，写入时按段落顺序原样还原
 */
export class DocumentStore {
    static async read(filePath: string): Promise<DocumentContent> {
        let buffer: Buffer;
        try {
            buffer = await fs.promises.readFile(filePath);
        } catch (error) {
            logger.error('读取简历文件失败', { filePath, error });
            throw new InputError('找不到简历文件或文件不可读', { filePath });
        }

        const paragraphs: Paragraph[] = [];
        const options = {
            ignoreEmptyParagraphs: false,
            transformDocument: (element: unknown): unknown => {
                collectParagraphs(element, paragraphs);
                return element;
            }
        };

        try {
            await mammoth.convertToHtml({ buffer }, options);
        } catch (error) {
            logger.error('解析简历文件失败', { filePath, error });
            throw new InputError('无法解析简历文件，请上传有效的 .docx 文档', { filePath });
        }

        logger.debug('已读取简历文档', { filePath, paragraphs: paragraphs.length });
        return { paragraphs };
    }

    /**
     * 先写入临时文件再重命名，写入失败时目标路径不会留下残缺文件
     */
    static async write(document: DocumentContent, filePath: string): Promise<void> {
        const tempPath = `${filePath}.${uuidv4()}.tmp`;

        try {
            await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
            const docx = new Document({
                sections: [{ children: document.paragraphs.map(toDocxParagraph) }]
            });
            const buffer = await Packer.toBuffer(docx);
            await fs.promises.writeFile(tempPath, buffer);
            await fs.promises.rename(tempPath, filePath);
        } catch (error) {
            await fs.promises.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
                logger.warn('清理临时文件失败', { tempPath, error: cleanupError });
            });
            logger.error('写入优化后的简历失败', { filePath, error });
            throw new OutputError('无法写入优化后的简历文件', { filePath });
        }

        logger.info('已写入优化后的简历', { filePath, paragraphs: document.paragraphs.length });
    }
}
