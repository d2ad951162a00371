import fs from 'fs';
import os from 'os';
import path from 'path';
import type { Server } from 'http';
import jwt from 'jsonwebtoken';
import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import { createApp } from '../backend/app';
import { config } from '../backend/config/app';
import Resume, { ResumeStatus } from '../backend/models/Resume';
import { ResumeService } from '../backend/services/resumeService';
import { OptimizationService } from '../backend/services/optimizationService';
import { InputError } from '../backend/services/optimizer/errors';
import { NullTokenPredictor } from '../backend/services/optimizer/resumeOptimizer';

vi.mock('../backend/services/resumeService', () => ({
    ResumeService: {
        uploadResume: vi.fn(),
        getResumes: vi.fn(),
        getResumeById: vi.fn(),
        deleteResume: vi.fn()
    }
}));

const RESUME_ID = '65f0c0ffee0000000000beef';
const JOB_DESCRIPTION = 'Docker, Kubernetes, CI/CD. Docker and Kubernetes for CI/CD pipelines.';

function makeResume(overrides: Partial<{ originalPath: string; optimizedPath: string; status: ResumeStatus }> = {}) {
    return new Resume({
        _id: RESUME_ID,
        userId: 'guest',
        originalName: 'resume.docx',
        originalPath: overrides.originalPath ?? '/tmp/none.docx',
        optimizedPath: overrides.optimizedPath,
        status: overrides.status ?? ResumeStatus.UPLOADED
    });
}

// ============================================================================
// HTTP layer, served in-process on an ephemeral port
// ============================================================================

describe('HTTP API', () => {
    const optimizationService = new OptimizationService(new NullTokenPredictor());
    let server: Server;
    let baseUrl: string;

    beforeAll(async () => {
        server = createApp({ optimizationService }).listen(0, '127.0.0.1');
        await new Promise<void>(resolve => server.once('listening', () => resolve()));
        const address = server.address();
        if (typeof address !== 'object' || address === null) {
            throw new Error('server did not bind to a port');
        }
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    afterAll(async () => {
        await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
    });

    afterEach(() => {
        vi.restoreAllMocks();
        vi.clearAllMocks();
    });

    function postJson(route: string, body: unknown, headers: Record<string, string> = {}): Promise<Response> {
        return fetch(`${baseUrl}${route}`, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json', ...headers },
            body: JSON.stringify(body)
        });
    }

    it('reports health', async () => {
        const res = await fetch(`${baseUrl}/api/health`);

        expect(res.status).toBe(200);
        expect(await res.json()).toMatchObject({ success: true, data: { status: 'OK' } });
    });

    it('returns 404 for unknown routes', async () => {
        const res = await fetch(`${baseUrl}/api/unknown`);

        expect(res.status).toBe(404);
        expect(await res.json()).toMatchObject({ success: false, error: { code: 'NOT_FOUND' } });
    });

    describe('POST /api/resume/:id/optimize', () => {
        const summary = {
            resumeId: RESUME_ID,
            status: ResumeStatus.COMPLETED,
            keywordsAdded: 1,
            insertedKeywords: ['Docker'],
            changeLog: ["Added 'Docker' to skills."]
        };

        it('rejects a malformed id', async () => {
            const res = await postJson('/api/resume/not-an-id/optimize', { jobDescription: JOB_DESCRIPTION });

            expect(res.status).toBe(400);
            expect(await res.json()).toMatchObject({ error: { code: 'VALIDATION_ERROR', details: { id: 'id 格式不正确' } } });
        });

        it('requires a job description', async () => {
            const res = await postJson(`/api/resume/${RESUME_ID}/optimize`, {});

            expect(res.status).toBe(400);
            expect(await res.json()).toMatchObject({
                error: { code: 'VALIDATION_ERROR', details: { jobDescription: 'jobDescription 字段是必填的' } }
            });
        });

        it('returns the optimization summary for a guest', async () => {
            const optimize = vi.spyOn(optimizationService, 'optimizeResume').mockResolvedValue(summary);

            const res = await postJson(`/api/resume/${RESUME_ID}/optimize`, { jobDescription: JOB_DESCRIPTION });

            expect(res.status).toBe(200);
            expect(await res.json()).toMatchObject({ success: true, data: summary });
            expect(optimize).toHaveBeenCalledWith(RESUME_ID, JOB_DESCRIPTION, 'guest');
        });

        it('takes the user id from a valid bearer token', async () => {
            const optimize = vi.spyOn(optimizationService, 'optimizeResume').mockResolvedValue(summary);
            const token = jwt.sign({ id: 'user-42' }, config.jwt.secret);

            await postJson(`/api/resume/${RESUME_ID}/optimize`, { jobDescription: JOB_DESCRIPTION, userId: 'someone-else' }, {
                Authorization: `Bearer ${token}`
            });

            expect(optimize).toHaveBeenCalledWith(RESUME_ID, JOB_DESCRIPTION, 'user-42');
        });

        it('falls back to the user id in the body', async () => {
            const optimize = vi.spyOn(optimizationService, 'optimizeResume').mockResolvedValue(summary);

            await postJson(`/api/resume/${RESUME_ID}/optimize`, { jobDescription: JOB_DESCRIPTION, userId: 'alice' }, {
                Authorization: 'Bearer not-a-valid-token'
            });

            expect(optimize).toHaveBeenCalledWith(RESUME_ID, JOB_DESCRIPTION, 'alice');
        });

        it('renders engine input errors as 400', async () => {
            vi.spyOn(optimizationService, 'optimizeResume').mockRejectedValue(new InputError('职位描述过短，至少需要50个字符'));

            const res = await postJson(`/api/resume/${RESUME_ID}/optimize`, { jobDescription: 'short' });

            expect(res.status).toBe(400);
            expect(await res.json()).toMatchObject({
                success: false,
                error: { code: 'INPUT_ERROR', message: '职位描述过短，至少需要50个字符' }
            });
        });
    });

    describe('POST /api/resume/upload', () => {
        it('rejects files that are not .docx', async () => {
            const form = new FormData();
            form.append('resume', new Blob(['hello']), 'notes.txt');

            const res = await fetch(`${baseUrl}/api/resume/upload`, { method: 'POST', body: form });

            expect(res.status).toBe(400);
            expect(await res.json()).toMatchObject({ error: { code: 'UNSUPPORTED_FILE_TYPE' } });
            expect(ResumeService.uploadResume).not.toHaveBeenCalled();
        });

        it('rejects a .docx name carrying another content type', async () => {
            const form = new FormData();
            form.append('resume', new Blob(['hello'], { type: 'text/plain' }), 'resume.docx');

            const res = await fetch(`${baseUrl}/api/resume/upload`, { method: 'POST', body: form });

            expect(res.status).toBe(400);
            expect(await res.json()).toMatchObject({
                error: { code: 'UNSUPPORTED_FILE_TYPE', details: { mimeType: 'text/plain' } }
            });
            expect(ResumeService.uploadResume).not.toHaveBeenCalled();
        });

        it('stores a .docx upload', async () => {
            vi.mocked(ResumeService.uploadResume).mockResolvedValue(makeResume());
            const form = new FormData();
            form.append('resume', new Blob(['hello']), 'resume.docx');

            const res = await fetch(`${baseUrl}/api/resume/upload`, { method: 'POST', body: form });

            expect(res.status).toBe(201);
            expect(await res.json()).toMatchObject({
                success: true,
                data: { resumeId: RESUME_ID, fileName: 'resume.docx', status: 'uploaded' }
            });
            expect(ResumeService.uploadResume).toHaveBeenCalledWith(expect.objectContaining({
                originalName: 'resume.docx',
                size: 5,
                userId: 'guest'
            }));
        });
    });

    describe('GET /api/resume/list', () => {
        it('rejects an unknown status filter', async () => {
            const res = await fetch(`${baseUrl}/api/resume/list?status=archived`);

            expect(res.status).toBe(400);
        });

        it('returns summaries with pagination', async () => {
            vi.mocked(ResumeService.getResumes).mockResolvedValue({
                resumes: [makeResume({ status: ResumeStatus.COMPLETED })],
                total: 1,
                page: 1,
                limit: 10,
                totalPages: 1
            });

            const res = await fetch(`${baseUrl}/api/resume/list?status=completed`);

            expect(res.status).toBe(200);
            expect(await res.json()).toMatchObject({
                data: [{ resumeId: RESUME_ID, status: 'completed', hasOptimizedDocx: false }],
                meta: { pagination: { page: 1, limit: 10, total: 1, totalPages: 1 } }
            });
            expect(ResumeService.getResumes).toHaveBeenCalledWith({
                userId: 'guest',
                status: ResumeStatus.COMPLETED,
                skip: 0,
                limit: 10
            });
        });
    });

    describe('GET /api/resume/:id/download', () => {
        let workDir: string;

        beforeAll(() => {
            workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'resume-http-'));
        });

        afterAll(() => {
            fs.rmSync(workDir, { recursive: true, force: true });
        });

        it('refuses the optimized file before optimization', async () => {
            vi.mocked(ResumeService.getResumeById).mockResolvedValue(makeResume());

            const res = await fetch(`${baseUrl}/api/resume/${RESUME_ID}/download?format=docx`);

            expect(res.status).toBe(404);
            expect(await res.json()).toMatchObject({ error: { code: 'RESUME_NOT_OPTIMIZED' } });
        });

        it('streams the original upload', async () => {
            const originalPath = path.join(workDir, 'original.docx');
            fs.writeFileSync(originalPath, 'original-bytes');
            vi.mocked(ResumeService.getResumeById).mockResolvedValue(makeResume({ originalPath }));

            const res = await fetch(`${baseUrl}/api/resume/${RESUME_ID}/download?format=original`);

            expect(res.status).toBe(200);
            expect(res.headers.get('content-disposition')).toContain('resume.docx');
            expect(await res.text()).toBe('original-bytes');
        });

        it('reports a missing file on disk', async () => {
            vi.mocked(ResumeService.getResumeById).mockResolvedValue(
                makeResume({ optimizedPath: path.join(workDir, 'gone.docx'), status: ResumeStatus.COMPLETED })
            );

            const res = await fetch(`${baseUrl}/api/resume/${RESUME_ID}/download`);

            expect(res.status).toBe(404);
            expect(await res.json()).toMatchObject({ error: { code: 'NOT_FOUND' } });
        });
    });

    it('deletes a resume', async () => {
        vi.mocked(ResumeService.deleteResume).mockResolvedValue();

        const res = await fetch(`${baseUrl}/api/resume/${RESUME_ID}`, { method: 'DELETE' });

        expect(res.status).toBe(200);
        expect(ResumeService.deleteResume).toHaveBeenCalledWith(RESUME_ID, 'guest');
    });
});
