import { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import request from 'supertest';
import { AgentModule } from './agent.module';
import { configureApp } from '../app.setup';

describe('AgentController (e2e)', () => {
  let app: INestApplication;

  beforeAll(async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true }),
        EventEmitterModule.forRoot(),
        AgentModule,
      ],
    }).compile();

    app = configureApp(moduleRef.createNestApplication({ logger: false }));
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  it('POST /agent/process returns the dispatch', async () => {
    const response = await request(app.getHttpServer())
      .post('/agent/process')
      .send({ text: '크롬 열어줘', now: '2024-12-10T06:30:00.000Z' })
      .expect(200);

    expect(response.body).toEqual({
      text: '크롬 열어줘',
      intent: 'app_open',
      confidence: expect.closeTo(0.9, 10),
      entities: [{ type: 'app_name', value: '크롬', start: 0, end: 2 }],
      dispatch: {
        handler: 'app',
        action: 'open',
        params: { kind: 'generic', values: { appName: '크롬' } },
      },
    });
  });

  it('rejects a malformed anchor', async () => {
    await request(app.getHttpServer())
      .post('/agent/process')
      .send({ text: '크롬 열어줘', now: 'yesterday' })
      .expect(400);
  });
});
