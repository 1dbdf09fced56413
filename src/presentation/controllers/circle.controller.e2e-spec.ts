/**
 * E2E TEST - Circles API
 *
 * HTTP request → Controller → Service → Repository → SQLite (in memory),
 * with the same pipe and exception filter as the real application.
 */

import { ValidationPipe } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { getRepositoryToken, TypeOrmModule } from '@nestjs/typeorm';
import request from 'supertest';
import { DataSource, Repository } from 'typeorm';
import { CircleService, HealthService } from '@/application/services';
import { CIRCLE_REPOSITORY } from '@/domain/repositories';
import { LOGGER_SERVICE } from '@/domain/services';
import { CircleEntity, MemberEntity } from '@/infrastructure/database/entities';
import { LoggerService } from '@/infrastructure/logger';
import { TypeOrmCircleRepository } from '@/infrastructure/repositories';
import { HttpExceptionFilter } from '@/presentation/filters';
import { CircleController } from './circle.controller';
import { HealthController } from './health.controller';
import { VersionController } from './version.controller';

describe('Circles API (E2E)', () => {
  let app: NestFastifyApplication;
  let dataSource: DataSource;
  let circleRows: Repository<CircleEntity>;
  let memberRows: Repository<MemberEntity>;

  const mockLogger = {
    log: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  };

  const musicClub = {
    circle_name: 'Music club',
    capacity: 10,
    owner_name: 'John',
    owner_age: 21,
    owner_grade: 3,
    owner_major: 'Music',
  };

  const createCircle = async (body: Record<string, unknown> = musicClub) =>
    request(app.getHttpServer()).post('/circle').send(body);

  beforeAll(async () => {
    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [
        TypeOrmModule.forRoot({
          type: 'better-sqlite3',
          database: ':memory:',
          entities: [CircleEntity, MemberEntity],
          synchronize: true,
          logging: false,
        }),
        TypeOrmModule.forFeature([CircleEntity, MemberEntity]),
      ],
      controllers: [VersionController, CircleController, HealthController],
      providers: [
        CircleService,
        HealthService,
        TypeOrmCircleRepository,
        { provide: CIRCLE_REPOSITORY, useExisting: TypeOrmCircleRepository },
        { provide: LOGGER_SERVICE, useValue: mockLogger },
      ],
    }).compile();

    app = moduleFixture.createNestApplication<NestFastifyApplication>(new FastifyAdapter());

    app.useGlobalPipes(
      new ValidationPipe({
        whitelist: true,
        forbidNonWhitelisted: true,
        transform: true,
      }),
    );
    app.useGlobalFilters(new HttpExceptionFilter());

    await app.init();
    await app.getHttpAdapter().getInstance().ready();

    dataSource = moduleFixture.get<DataSource>(DataSource);
    circleRows = moduleFixture.get<Repository<CircleEntity>>(getRepositoryToken(CircleEntity));
    memberRows = moduleFixture.get<Repository<MemberEntity>>(getRepositoryToken(MemberEntity));
  }, 30000);

  beforeEach(async () => {
    await memberRows.clear();
    await circleRows.clear();
    jest.clearAllMocks();
    // the filter logs through its own LoggerService
    jest.spyOn(LoggerService.prototype, 'warn').mockImplementation(() => {});
    jest.spyOn(LoggerService.prototype, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  afterAll(async () => {
    if (dataSource?.isInitialized) {
      await dataSource.destroy();
    }
    await app?.close();
  }, 10000);

  // ============================================================
  // GET /
  // ============================================================

  describe('GET /', () => {
    it('should return the version as plain text', async () => {
      const response = await request(app.getHttpServer()).get('/');

      expect(response.status).toBe(200);
      expect(response.text).toBe('0.1.0');
      expect(response.headers['content-type']).toBe('text/plain; charset=utf-8');
    });
  });

  // ============================================================
  // POST /circle
  // ============================================================

  describe('POST /circle', () => {
    it('should create a circle with its owner and return both ids', async () => {
      const response = await createCircle();

      expect(response.status).toBe(201);
      expect(response.body.circle_id).toBeGreaterThan(0);
      expect(response.body.owner_id).toBeGreaterThan(0);

      const circleRow = await circleRows.findOneByOrFail({ id: response.body.circle_id });
      expect(circleRow.ownerId).toBe(response.body.owner_id);
    });

    it('should accept a lower-case major and store its canonical name', async () => {
      const created = await createCircle({ ...musicClub, owner_major: 'music' });

      const owner = await memberRows.findOneByOrFail({ id: created.body.owner_id });
      expect(owner.major).toBe('Music');
    });

    it('should return 400 for grade 5 without writing anything', async () => {
      const response = await createCircle({ ...musicClub, owner_grade: 5 });

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({
        statusCode: 400,
        message: 'grade must be an integer between 1 and 4',
        error: 'Bad Request',
        path: '/circle',
      });
      expect(await circleRows.count()).toBe(0);
      expect(await memberRows.count()).toBe(0);
    });

    it('should return 400 for an unknown major', async () => {
      const response = await createCircle({ ...musicClub, owner_major: 'Physics' });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe(
        'major must be one of: Math, ComputerScience, Economics, Law, Literature, Music, Other',
      );
    });

    it('should return 400 when capacity is not an integer', async () => {
      const response = await createCircle({ ...musicClub, capacity: 'ten' });

      expect(response.status).toBe(400);
      expect(response.body.message).toEqual(['capacity must be an integer']);
    });

    it('should return 400 for unknown properties', async () => {
      const response = await createCircle({ ...musicClub, extra: true });

      expect(response.status).toBe(400);
      expect(response.body.message).toEqual(['property extra should not exist']);
    });
  });

  // ============================================================
  // GET /circle/:id
  // ============================================================

  describe('GET /circle/:id', () => {
    it('should return the circle with its owner and no members', async () => {
      const created = await createCircle();

      const response = await request(app.getHttpServer()).get(`/circle/${created.body.circle_id}`);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        circle_id: created.body.circle_id,
        circle_name: 'Music club',
        capacity: 10,
        owner: { id: created.body.owner_id, name: 'John', age: 21, grade: 3, major: 'Music' },
        members: [],
      });
    });

    it('should return 404 when the circle does not exist', async () => {
      const response = await request(app.getHttpServer()).get('/circle/9999');

      expect(response.status).toBe(404);
      expect(response.body).toMatchObject({
        statusCode: 404,
        message: 'Circle not found',
        error: 'Not Found',
        path: '/circle/9999',
      });
    });

    it('should return 400 for a non-numeric id', async () => {
      const response = await request(app.getHttpServer()).get('/circle/abc');

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('Validation failed (numeric string is expected)');
    });
  });

  // ============================================================
  // PUT /circle/:id
  // ============================================================

  describe('PUT /circle/:id', () => {
    it('should rename and resize the circle', async () => {
      const created = await createCircle();
      const id = created.body.circle_id;

      const response = await request(app.getHttpServer())
        .put(`/circle/${id}`)
        .send({ circle_name: 'Football club', capacity: 20 });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ id });

      const fetched = await request(app.getHttpServer()).get(`/circle/${id}`);
      expect(fetched.body.circle_name).toBe('Football club');
      expect(fetched.body.capacity).toBe(20);
      expect(fetched.body.owner.id).toBe(created.body.owner_id);
    });

    it('should keep omitted fields', async () => {
      const created = await createCircle();
      const id = created.body.circle_id;

      await request(app.getHttpServer()).put(`/circle/${id}`).send({ capacity: 15 });

      const fetched = await request(app.getHttpServer()).get(`/circle/${id}`);
      expect(fetched.body.circle_name).toBe('Music club');
      expect(fetched.body.capacity).toBe(15);
    });

    it('should treat a null name as not supplied', async () => {
      const created = await createCircle();
      const id = created.body.circle_id;

      const response = await request(app.getHttpServer())
        .put(`/circle/${id}`)
        .send({ circle_name: null, capacity: 20 });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ id });

      const fetched = await request(app.getHttpServer()).get(`/circle/${id}`);
      expect(fetched.body.circle_name).toBe('Music club');
      expect(fetched.body.capacity).toBe(20);
    });

    it('should return 400 when capacity drops below the headcount', async () => {
      const created = await createCircle();
      const id = created.body.circle_id;
      await request(app.getHttpServer())
        .post(`/circle/${id}/members`)
        .send({ name: 'Paul', age: 20, grade: 2, major: 'Music' });

      const response = await request(app.getHttpServer()).put(`/circle/${id}`).send({ capacity: 1 });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('capacity must be an integer of at least 2 (current members)');
    });

    it('should return 404 when the circle does not exist', async () => {
      const response = await request(app.getHttpServer()).put('/circle/9999').send({ capacity: 20 });

      expect(response.status).toBe(404);
      expect(response.body.message).toBe('Circle not found');
    });
  });

  // ============================================================
  // POST /circle/:id/members
  // ============================================================

  describe('POST /circle/:id/members', () => {
    it('should add members in order and keep the owner', async () => {
      const created = await createCircle();
      const id = created.body.circle_id;

      const paul = await request(app.getHttpServer())
        .post(`/circle/${id}/members`)
        .send({ name: 'Paul', age: 20, grade: 2, major: 'Music' });
      const george = await request(app.getHttpServer())
        .post(`/circle/${id}/members`)
        .send({ name: 'George', age: 19, grade: 1, major: 'literature' });

      expect(paul.status).toBe(201);
      expect(paul.body.circle_id).toBe(id);
      expect(george.status).toBe(201);

      const fetched = await request(app.getHttpServer()).get(`/circle/${id}`);
      expect(fetched.body.owner.id).toBe(created.body.owner_id);
      expect(fetched.body.members).toEqual([
        { id: paul.body.member_id, name: 'Paul', age: 20, grade: 2, major: 'Music' },
        { id: george.body.member_id, name: 'George', age: 19, grade: 1, major: 'Literature' },
      ]);
    });

    it('should return 400 when the circle is full', async () => {
      const created = await createCircle({ ...musicClub, capacity: 1 });

      const response = await request(app.getHttpServer())
        .post(`/circle/${created.body.circle_id}/members`)
        .send({ name: 'Paul', age: 20, grade: 2, major: 'Music' });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('circle is full (capacity 1)');
      expect(await memberRows.count()).toBe(1);
    });

    it('should return 404 when the circle does not exist', async () => {
      const response = await request(app.getHttpServer())
        .post('/circle/9999/members')
        .send({ name: 'Paul', age: 20, grade: 2, major: 'Music' });

      expect(response.status).toBe(404);
    });
  });

  // ============================================================
  // DELETE /circle/:id
  // ============================================================

  describe('DELETE /circle/:id', () => {
    it('should delete the circle and its members', async () => {
      const created = await createCircle();
      const id = created.body.circle_id;
      await request(app.getHttpServer())
        .post(`/circle/${id}/members`)
        .send({ name: 'Paul', age: 20, grade: 2, major: 'Music' });

      const response = await request(app.getHttpServer()).delete(`/circle/${id}`);

      expect(response.status).toBe(204);
      expect(await circleRows.count()).toBe(0);
      expect(await memberRows.count()).toBe(0);

      const fetched = await request(app.getHttpServer()).get(`/circle/${id}`);
      expect(fetched.status).toBe(404);
    });

    it('should return 404 when the circle does not exist', async () => {
      const response = await request(app.getHttpServer()).delete('/circle/9999');

      expect(response.status).toBe(404);
    });
  });

  // ============================================================
  // GET /health
  // ============================================================

  describe('GET /health', () => {
    it('should report a healthy database', async () => {
      const response = await request(app.getHttpServer()).get('/health');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('healthy');
      expect(response.body.database.status).toBe('healthy');
    });
  });
});
