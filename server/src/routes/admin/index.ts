import path from 'path';
import { Router, Request, Response, NextFunction } from 'express';

/**
 * Resolve the admin page shipped beside the package.
 * __dirname will be server/dist/routes/admin or server/src/routes/admin.
 */
export function getAdminPagePath(): string {
  return path.resolve(__dirname, '..', '..', '..', 'assets', 'admin.html');
}

export function createAdminRouter(): Router {
  const router = Router();
  const pagePath = getAdminPagePath();

  // GET /prometheus/admin - Scenario control panel
  router.get('/admin', (_req: Request, res: Response, next: NextFunction) => {
    res.sendFile(pagePath, (err) => {
      if (err) {
        next(err);
      }
    });
  });

  return router;
}
