import './utils/e2e-env';
import { HttpService } from '@nestjs/axios';
import { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import type { AxiosResponse } from 'axios';
import { Observable, of, Subject } from 'rxjs';
import request from 'supertest';
import { AppModule } from '../src/app.module';
import { configureApp } from '../src/app.setup';
import { CHAT_FALLBACK_REPLY } from '../src/chat/chat.service';
import { DOCX_MIME_TYPE } from '../src/documents/documents.service';
import { WebhookDispatcherService } from '../src/documents/webhook-dispatcher.service';
import { JobStoreService } from '../src/store/job-store.service';
import { axiosResponse, waitUntil } from './utils/http';

const DOCX = Buffer.from([0x50, 0x4b, 0x03, 0x04, 0x14, 0x00, 0x06, 0x00]);

describe('Demand letter service (e2e)', () => {
  let app: INestApplication;
  let dispatcher: WebhookDispatcherService;
  let documentReply: () => Observable<AxiosResponse<unknown>>;
  let chatReply: () => Observable<AxiosResponse<unknown>>;
  const http = {
    post: jest.fn((url: string) =>
      url === 'http://webhook.test/chat' ? chatReply() : documentReply(),
    ),
  };

  function upload(txt = 'Dear {{name}}', csv = 'name\nAda') {
    return request(app.getHttpServer())
      .post('/upload')
      .attach('txt_file', Buffer.from(txt), 'template.txt')
      .attach('csv_file', Buffer.from(csv), 'data.csv');
  }

  beforeAll(async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(HttpService)
      .useValue(http)
      .compile();

    app = moduleRef.createNestApplication();
    configureApp(app);
    await app.init();
    dispatcher = app.get(WebhookDispatcherService);
  });

  beforeEach(() => {
    http.post.mockClear();
    documentReply = () => of(axiosResponse(DOCX));
    chatReply = () => of(axiosResponse('hi there'));
  });

  afterAll(async () => {
    await dispatcher.whenIdle();
    await app.close();
  });

  describe('upload, status and download', () => {
    it('generates and serves the document', async () => {
      const accepted = await upload().expect(202);
      expect(accepted.body).toEqual({ success: true, job_id: expect.any(Number) });
      const jobId: number = accepted.body.job_id;

      await dispatcher.whenIdle();

      const status = await request(app.getHttpServer())
        .get(`/check_status/${jobId}`)
        .expect(200);
      expect(status.body).toEqual({
        status: 'completed',
        filename: `demand_letter_${jobId}.docx`,
      });

      const download = await request(app.getHttpServer())
        .get(`/download/${jobId}`)
        .responseType('blob')
        .expect(200);
      expect(download.headers['content-type']).toBe(DOCX_MIME_TYPE);
      expect(download.headers['content-disposition']).toBe(
        `attachment; filename="demand_letter_${jobId}.docx"`,
      );
      expect(Buffer.isBuffer(download.body)).toBe(true);
      expect(DOCX.equals(download.body)).toBe(true);
    });

    it('answers 409 for downloads while the job is processing', async () => {
      const reply = new Subject<AxiosResponse<unknown>>();
      documentReply = () => reply;

      const accepted = await upload().expect(202);
      const jobId: number = accepted.body.job_id;

      const status = await request(app.getHttpServer())
        .get(`/check_status/${jobId}`)
        .expect(200);
      expect(status.body).toEqual({ status: 'processing', filename: null });

      const download = await request(app.getHttpServer())
        .get(`/download/${jobId}`)
        .expect(409);
      expect(download.body).toMatchObject({
        statusCode: 409,
        error: 'File is not ready yet',
        path: `/download/${jobId}`,
      });

      await waitUntil(() => http.post.mock.calls.length === 1);
      reply.next(axiosResponse(DOCX));
      reply.complete();
      await dispatcher.whenIdle();
    });

    it('reports a failed generation and refuses its download', async () => {
      documentReply = () => of(axiosResponse(Buffer.from('boom'), 500));

      const accepted = await upload().expect(202);
      const jobId: number = accepted.body.job_id;
      await dispatcher.whenIdle();

      const status = await request(app.getHttpServer())
        .get(`/check_status/${jobId}`)
        .expect(200);
      expect(status.body).toEqual({
        status: 'failed',
        filename: null,
        error: 'Document webhook responded with HTTP 500',
      });
      await request(app.getHttpServer()).get(`/download/${jobId}`).expect(404);
    });

    it('rejects a non-txt template without calling the webhook', async () => {
      const response = await request(app.getHttpServer())
        .post('/upload')
        .attach('txt_file', Buffer.from('%PDF-1.7'), 'template.pdf')
        .attach('csv_file', Buffer.from('name\nAda'), 'data.csv')
        .expect(400);

      expect(response.body.error).toBe(
        'Invalid file types. Only TXT and CSV files are allowed',
      );
      expect(http.post).not.toHaveBeenCalled();
    });

    it('rejects a request without files', async () => {
      const response = await request(app.getHttpServer())
        .post('/upload')
        .expect(400);
      expect(response.body.error).toBe('Both TXT and CSV files are required');
    });

    it('rejects a part above the upload limit', async () => {
      await upload('x'.repeat(2048)).expect(413);
      expect(http.post).not.toHaveBeenCalled();
    });

    it('answers 404 for unknown jobs', async () => {
      const response = await request(app.getHttpServer())
        .get('/check_status/999999')
        .expect(404);
      expect(response.body).toMatchObject({
        statusCode: 404,
        error: 'File not found',
        path: '/check_status/999999',
      });
      await request(app.getHttpServer()).get('/download/999999').expect(404);
    });

    it('rejects a non-numeric job id', async () => {
      await request(app.getHttpServer()).get('/check_status/abc').expect(400);
    });
  });

  describe('chat', () => {
    it('returns the webhook reply and records it', async () => {
      const response = await request(app.getHttpServer())
        .post('/send_message')
        .send({ message: 'hello' })
        .expect(200);
      expect(response.body).toEqual({ response: 'hi there' });

      const history = await request(app.getHttpServer())
        .get('/chat/history')
        .expect(200);
      expect(history.body.at(-1)).toMatchObject({
        user_message: 'hello',
        bot_response: 'hi there',
      });
    });

    it('answers 502 with the fallback reply when the webhook fails', async () => {
      chatReply = () => of(axiosResponse('unavailable', 503));

      const response = await request(app.getHttpServer())
        .post('/send_message')
        .send({ message: 'are you there?' })
        .expect(502);
      expect(response.body.error).toBe(CHAT_FALLBACK_REPLY);
    });

    it('rejects an empty message', async () => {
      const response = await request(app.getHttpServer())
        .post('/send_message')
        .send({ message: '   ' })
        .expect(400);
      expect(response.body.error).toBe('Message cannot be empty');
    });

    it('rejects a body without a message', async () => {
      await request(app.getHttpServer())
        .post('/send_message')
        .send({})
        .expect(400);
    });
  });

  describe('history', () => {
    it('lists jobs filtered by status with per-status counts', async () => {
      documentReply = () => of(axiosResponse(Buffer.from('boom'), 502));
      const accepted = await upload().expect(202);
      const failedId: number = accepted.body.job_id;
      await dispatcher.whenIdle();

      const response = await request(app.getHttpServer())
        .get('/history')
        .query({ status: 'failed', limit: 500 })
        .expect(200);

      expect(response.body.jobs.map((job: { id: number }) => job.id)).toContain(
        failedId,
      );
      expect(
        response.body.jobs.every(
          (job: { status: string }) => job.status === 'failed',
        ),
      ).toBe(true);
      expect(response.body.total).toBe(response.body.counts.failed);
      expect(response.body.jobs[0]).not.toHaveProperty('txt_content');
    });

    it.each([
      ['an out-of-range limit', { limit: 0 }],
      ['an unknown status', { status: 'queued' }],
      ['an unknown parameter', { colour: 'blue' }],
      ['an invalid date', { from: 'yesterday' }],
      ['a week date', { from: '2026-W05' }],
      ['an ordinal date', { to: '2026-032' }],
      ['an hour-only time', { from: '2026-01-01T10' }],
    ])('rejects %s', async (_case, query) => {
      await request(app.getHttpServer()).get('/history').query(query).expect(400);
    });
  });

  it('reports health', async () => {
    const response = await request(app.getHttpServer())
      .get('/health')
      .expect(200);
    expect(response.body).toMatchObject({
      status: 'healthy',
      database: 'up',
      inFlightDispatches: 0,
    });
  });

  it('answers 503 with the unhealthy document when the database is down', async () => {
    jest
      .spyOn(app.get(JobStoreService), 'ping')
      .mockRejectedValueOnce(new Error('disk I/O error'));

    const response = await request(app.getHttpServer())
      .get('/health')
      .expect(503);
    expect(response.body).toEqual({
      status: 'unhealthy',
      database: 'down',
      message: 'disk I/O error',
      timestamp: expect.any(String),
    });
  });
});
