/**
 * Files Routes
 * REST API over the shared HTTP viewer session
 */

import { Router, Request, Response } from 'express';
import * as path from 'path';
import type { LineWindow } from '../../shared/types.js';
import { viewerSessionService } from '../services/index.js';
import { FileViewerError, describeError } from '../viewer/errors.js';
import type { FileViewer } from '../viewer/file-viewer.js';
import { logger } from '../utils/logger.js';

const log = logger.http;

// All HTTP clients share one viewer session
export const HTTP_VIEWER_KEY = 'http';

// Upper bound for one /lines window
const MAX_WINDOW_LINES = 5000;

function readQueryInt(req: Request, name: string): number | null {
  const raw = req.query[name];
  if (typeof raw !== 'string' || raw.trim() === '') return null;
  const value = Number(raw);
  return Number.isInteger(value) ? value : null;
}

function requireViewer(res: Response): FileViewer | null {
  const viewer = viewerSessionService.getSession(HTTP_VIEWER_KEY);
  if (!viewer) {
    res.status(404).json({ error: 'No file is open' });
    return null;
  }
  return viewer;
}

const router = Router();

// POST /api/files/open - Open a file or directory for viewing
router.post('/open', async (req: Request, res: Response) => {
  const body: unknown = req.body;
  const filePath = typeof body === 'object' && body !== null && 'path' in body ? body.path : undefined;

  if (typeof filePath !== 'string' || !filePath) {
    res.status(400).json({ error: 'Missing path parameter' });
    return;
  }

  if (!path.isAbsolute(filePath)) {
    res.status(400).json({ error: 'Path must be absolute' });
    return;
  }

  try {
    const viewer = await viewerSessionService.openSession(HTTP_VIEWER_KEY, filePath);
    res.json({ info: viewer.fileInfo, status: viewer.getStatus() });
  } catch (err) {
    if (err instanceof FileViewerError && err.code === 'NOT_FOUND') {
      res.status(404).json({ error: err.message });
      return;
    }
    if (err instanceof FileViewerError && err.code === 'SUPERSEDED') {
      res.status(409).json({ error: err.message });
      return;
    }
    log.error(' Failed to open file:', err);
    res.status(500).json({ error: describeError(err) });
  }
});

// GET /api/files/info - Metadata of the open file
router.get('/info', (_req: Request, res: Response) => {
  const viewer = requireViewer(res);
  if (!viewer) return;
  res.json(viewer.fileInfo);
});

// GET /api/files/status - Load progress of the open file
router.get('/status', (_req: Request, res: Response) => {
  const viewer = requireViewer(res);
  if (!viewer) return;
  res.json(viewer.getStatus());
});

// GET /api/files/line?index=N - A single line, if decoded yet
router.get('/line', (req: Request, res: Response) => {
  const index = readQueryInt(req, 'index');
  if (index === null || index < 0) {
    res.status(400).json({ error: 'index must be a non-negative integer' });
    return;
  }

  const viewer = requireViewer(res);
  if (!viewer) return;

  const line = viewer.getLine(index);
  res.json({ index, line: line ?? null, available: line !== undefined });
});

// GET /api/files/lines?start=N&end=M - The decoded lines in [start, end)
router.get('/lines', (req: Request, res: Response) => {
  const start = readQueryInt(req, 'start') ?? 0;
  const requestedEnd = readQueryInt(req, 'end') ?? start + MAX_WINDOW_LINES;
  if (start < 0 || requestedEnd < start) {
    res.status(400).json({ error: 'Expected 0 <= start <= end' });
    return;
  }

  const viewer = requireViewer(res);
  if (!viewer) return;

  const end = Math.min(requestedEnd, start + MAX_WINDOW_LINES);
  const window: LineWindow = {
    start,
    lines: viewer.getLines(start, end),
    lineCount: viewer.getLineCount(),
  };
  res.json(window);
});

// GET /api/files/content - Whole text, or a hex dump for binary content
router.get('/content', (_req: Request, res: Response) => {
  const viewer = requireViewer(res);
  if (!viewer) return;
  res.json({ content: viewer.getContent() });
});

// POST /api/files/close - Close the open file
router.post('/close', async (_req: Request, res: Response) => {
  const closed = await viewerSessionService.closeSession(HTTP_VIEWER_KEY);
  res.json({ closed });
});

export default router;
