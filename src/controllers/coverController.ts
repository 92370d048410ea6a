import * as path from 'path';
import * as fs from 'fs-extra';
import { Request, Response, NextFunction } from 'express';
import { LibraryJobHandlers } from '../services/jobHandlers/LibraryJobHandlers.js';
import { segmentsBelow } from '../services/watchers/pathFilter.js';
import { ResourceNotFoundError, UnprocessableError, ValidationError } from '../errors/index.js';
import { coverRequestSchema } from '../validation/pipelineSchemas.js';

/**
 * Cover Controller
 *
 * POST /api/cover { albumDir }: resolves cover art synchronously for one
 * album directory under the library root.
 */
export class CoverController {
  constructor(
    private readonly handlers: LibraryJobHandlers,
    private readonly libraryRoot: string
  ) {}

  async fetch(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { albumDir } = coverRequestSchema.parse(req.body);
      const resolved = path.resolve(this.libraryRoot, albumDir);

      const segments = segmentsBelow(this.libraryRoot, resolved);
      if (!segments) {
        throw new ValidationError('albumDir must be a directory inside the library', {
          service: 'CoverController',
          operation: 'fetch',
        });
      }

      const stat = await fs.stat(resolved).catch(() => null);
      if (!stat?.isDirectory()) {
        throw new ResourceNotFoundError('Album directory', albumDir);
      }

      const result = await this.handlers.resolveCover(resolved);
      if (result.source === null) {
        throw new UnprocessableError(`No cover art found for ${path.basename(resolved)}`, {
          service: 'CoverController',
          operation: 'fetch',
        });
      }

      res.json(result);
    } catch (error) {
      next(error);
    }
  }
}
