import { describe, it, expect, vi, beforeEach } from 'vitest';
import request from 'supertest';
import type { Response } from 'supertest';
import { createProgramDraft, type ApiResponse } from '../__tests__/utils/index.js';
import { ProgramPersistenceError } from '../types/errors.js';
import type { TrainingProgram, TrainingProgramWithWeeks } from '../types/program.js';

const mockProgramRepository = vi.hoisted(() => ({
  findById: vi.fn(),
  findByUserId: vi.fn(),
  findWithWeeks: vi.fn(),
  updateStatus: vi.fn(),
}));

const mockGenerator = vi.hoisted(() => ({
  generate: vi.fn(),
}));

const mockGetProgramGenerator = vi.hoisted(() => vi.fn(() => mockGenerator));

vi.mock('../firebase.js', () => ({
  getFirestoreDb: vi.fn(),
  getCollectionName: vi.fn((name: string) => name),
}));

vi.mock('firebase-functions/params', () => ({
  defineSecret: vi.fn(() => ({
    value: (): string => 'test-api-key',
  })),
}));

vi.mock('../repositories/program.repository.js', () => ({
  ProgramRepository: vi.fn(function ProgramRepository() {
    return mockProgramRepository;
  }),
}));

vi.mock('../services/index.js', () => ({
  getProgramGenerator: mockGetProgramGenerator,
}));

// Import after mocks
import { programsApp } from './programs.js';

function storedProgram(overrides: Partial<TrainingProgram> = {}): TrainingProgram {
  return {
    id: 'program-1',
    ...createProgramDraft(),
    created_at: '2024-01-01T00:00:00Z',
    updated_at: '2024-01-01T00:00:00Z',
    ...overrides,
  };
}

describe('Programs Handler', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('POST /programs/generate', () => {
    it('validates the request and returns the generated program', async () => {
      const program: TrainingProgramWithWeeks = { ...storedProgram(), weeks: [] };
      const generated = {
        program,
        generation_metadata: program.generation_metadata,
        suggestions: ['Deload every fourth week'],
      };
      mockGenerator.generate.mockResolvedValue(generated);

      const response: Response = await request(programsApp)
        .post('/programs/generate')
        .set('x-user-id', 'user-7')
        .send({
          goal: 'strength',
          duration_weeks: 4,
          sessions_per_week: 3,
          experience_level: 'beginner',
          limitations: ['bad\nknee'],
        });

      expect(response.status).toBe(201);
      expect(response.body).toEqual({ success: true, data: generated });
      expect(mockGetProgramGenerator).toHaveBeenCalledWith('test-api-key');
      expect(mockGenerator.generate).toHaveBeenCalledWith(
        {
          goal: 'strength',
          duration_weeks: 4,
          sessions_per_week: 3,
          experience_level: 'beginner',
          equipment_available: [],
          limitations: ['bad knee'],
          focus_areas: [],
        },
        'user-7'
      );
    });

    it('rejects an invalid request before generating', async () => {
      const response = await request(programsApp)
        .post('/programs/generate')
        .send({ goal: 'strength', duration_weeks: 0, sessions_per_week: 3, experience_level: 'beginner' });

      const body = response.body as ApiResponse<unknown>;
      expect(response.status).toBe(400);
      expect(body.success).toBe(false);
      expect(mockGenerator.generate).not.toHaveBeenCalled();
    });

    it('rejects unknown fields', async () => {
      const response = await request(programsApp).post('/programs/generate').send({
        goal: 'strength',
        duration_weeks: 4,
        sessions_per_week: 3,
        experience_level: 'beginner',
        favourite_color: 'blue',
      });

      expect(response.status).toBe(400);
    });

    it('returns the generation error code when saving fails', async () => {
      mockGenerator.generate.mockRejectedValue(new ProgramPersistenceError('Failed to save program'));

      const response = await request(programsApp).post('/programs/generate').send({
        goal: 'hypertrophy',
        duration_weeks: 8,
        sessions_per_week: 4,
        experience_level: 'intermediate',
      });

      expect(response.status).toBe(500);
      expect(response.body).toEqual({
        success: false,
        error: { code: 'PROGRAM_PERSISTENCE_FAILED', message: 'Failed to save program' },
      });
    });
  });

  describe('GET /programs', () => {
    it('lists programs for the requesting user', async () => {
      mockProgramRepository.findByUserId.mockResolvedValue([storedProgram({ user_id: 'user-7' })]);

      const response = await request(programsApp).get('/programs').set('x-user-id', 'user-7');

      const body = response.body as ApiResponse<TrainingProgram[]>;
      expect(response.status).toBe(200);
      expect(body.data?.map((program) => program.id)).toEqual(['program-1']);
      expect(mockProgramRepository.findByUserId).toHaveBeenCalledWith('user-7');
    });

    it('falls back to the default user without a header', async () => {
      mockProgramRepository.findByUserId.mockResolvedValue([]);

      await request(programsApp).get('/programs');

      expect(mockProgramRepository.findByUserId).toHaveBeenCalledWith('default-user');
    });
  });

  describe('GET /programs/:id', () => {
    it('returns the program with its weeks', async () => {
      const program: TrainingProgramWithWeeks = { ...storedProgram(), weeks: [] };
      mockProgramRepository.findWithWeeks.mockResolvedValue(program);

      const response = await request(programsApp).get('/programs/program-1').set('x-user-id', 'user-1');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ success: true, data: program });
      expect(mockProgramRepository.findWithWeeks).toHaveBeenCalledWith('program-1');
    });

    it('returns 404 for a missing program', async () => {
      mockProgramRepository.findWithWeeks.mockResolvedValue(null);

      const response = await request(programsApp).get('/programs/missing');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({
        success: false,
        error: { code: 'NOT_FOUND', message: 'Program with id missing not found' },
      });
    });

    it("returns 404 for another user's program", async () => {
      mockProgramRepository.findWithWeeks.mockResolvedValue({ ...storedProgram(), weeks: [] });

      const response = await request(programsApp).get('/programs/program-1').set('x-user-id', 'user-2');

      expect(response.status).toBe(404);
    });
  });

  describe('PATCH /programs/:id/status', () => {
    it('updates the status', async () => {
      mockProgramRepository.findById.mockResolvedValue(storedProgram());
      mockProgramRepository.updateStatus.mockResolvedValue(storedProgram({ status: 'active' }));

      const response = await request(programsApp)
        .patch('/programs/program-1/status')
        .set('x-user-id', 'user-1')
        .send({ status: 'active' });

      const body = response.body as ApiResponse<TrainingProgram>;
      expect(response.status).toBe(200);
      expect(body.data?.status).toBe('active');
      expect(mockProgramRepository.updateStatus).toHaveBeenCalledWith('program-1', 'active');
    });

    it('rejects an unknown status', async () => {
      const response = await request(programsApp)
        .patch('/programs/program-1/status')
        .send({ status: 'paused' });

      expect(response.status).toBe(400);
      expect(mockProgramRepository.findById).not.toHaveBeenCalled();
    });

    it("does not update another user's program", async () => {
      mockProgramRepository.findById.mockResolvedValue(storedProgram());

      const response = await request(programsApp)
        .patch('/programs/program-1/status')
        .set('x-user-id', 'user-2')
        .send({ status: 'archived' });

      expect(response.status).toBe(404);
      expect(mockProgramRepository.updateStatus).not.toHaveBeenCalled();
    });
  });
});
