import { type Request, type Response, type NextFunction } from 'express';
import { defineSecret } from 'firebase-functions/params';
import { info } from 'firebase-functions/logger';
import { z } from 'zod';
import { createBaseApp } from '../middleware/create-base-app.js';
import { errorHandler, NotFoundError } from '../middleware/error-handler.js';
import { asyncHandler } from '../middleware/async-handler.js';
import { validate, validateParams } from '../middleware/validate.js';
import { getFirestoreDb } from '../firebase.js';
import { ProgramRepository } from '../repositories/program.repository.js';
import {
  generateProgramRequestSchema,
  updateProgramStatusSchema,
  type GenerateProgramRequest,
  type UpdateProgramStatusDTO,
} from '../schemas/index.js';
import { getProgramGenerator } from '../services/index.js';

const openaiApiKey = defineSecret('OPENAI_API_KEY');

const idParamsSchema = z.object({ id: z.string().min(1) });

const app = createBaseApp('programs');

// Lazy repository initialization
let programRepo: ProgramRepository | null = null;
function getRepo(): ProgramRepository {
  if (programRepo === null) {
    programRepo = new ProgramRepository(getFirestoreDb());
  }
  return programRepo;
}

/**
 * Get user ID from request headers.
 * Authentication happens upstream of this function.
 */
function getUserId(req: Request): string {
  const userId = req.headers['x-user-id'];
  if (typeof userId === 'string' && userId.length > 0) {
    return userId;
  }
  return 'default-user';
}

// POST /programs/generate
app.post(
  '/generate',
  validate(generateProgramRequestSchema),
  asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const userId = getUserId(req);
    const body = req.body as GenerateProgramRequest;
    // Without a key the generator uses rule-based selection only.
    const generator = getProgramGenerator(openaiApiKey.value());
    const result = await generator.generate(body, userId);

    info('programs:generated', {
      program_id: result.program.id,
      user_id: userId,
      llm_used: result.generation_metadata.llm_used,
    });
    res.status(201).json({ success: true, data: result });
  })
);

// GET /programs
app.get('/', asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
  const programs = await getRepo().findByUserId(getUserId(req));
  res.json({ success: true, data: programs });
}));

// GET /programs/:id
app.get(
  '/:id',
  validateParams(idParamsSchema),
  asyncHandler(async (req: Request, res: Response, next: NextFunction) => {
    const id = req.params['id'] ?? '';
    const program = await getRepo().findWithWeeks(id);
    if (program === null || program.user_id !== getUserId(req)) {
      next(new NotFoundError('Program', id));
      return;
    }
    res.json({ success: true, data: program });
  })
);

// PATCH /programs/:id/status
app.patch(
  '/:id/status',
  validateParams(idParamsSchema),
  validate(updateProgramStatusSchema),
  asyncHandler(async (req: Request, res: Response, next: NextFunction) => {
    const id = req.params['id'] ?? '';
    const body = req.body as UpdateProgramStatusDTO;
    const existing = await getRepo().findById(id);
    if (existing === null || existing.user_id !== getUserId(req)) {
      next(new NotFoundError('Program', id));
      return;
    }
    const program = await getRepo().updateStatus(id, body.status);
    if (program === null) {
      next(new NotFoundError('Program', id));
      return;
    }
    res.json({ success: true, data: program });
  })
);

// Error handler must be last
app.use(errorHandler);

export const programsApp = app;
