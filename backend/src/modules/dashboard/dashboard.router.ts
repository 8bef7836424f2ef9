import { Router, type Response } from 'express';
import { dashboardService } from './dashboard.module.js';
import {
  DIMENSIONS,
  DatasetError,
  MEASURES,
  type ExportDimension,
  type Measure,
  type YearSelection
} from './dashboard.types.js';

const router = Router();

const exportDimensions: ExportDimension[] = [...DIMENSIONS, 'month'];

export const resolveYearSelection = (value: unknown): YearSelection => {
  if (typeof value !== 'string') {
    return 'all';
  }
  const normalized = value.trim();
  if (!/^\d{1,4}$/.test(normalized)) {
    return 'all';
  }
  return Number(normalized);
};

export const resolveMeasure = (value: unknown): Measure | null => {
  if (typeof value !== 'string') {
    return null;
  }
  const normalized = value.trim();
  return MEASURES.find((measure) => measure === normalized) ?? null;
};

export const resolveExportDimension = (value: unknown): ExportDimension | null => {
  if (typeof value !== 'string') {
    return null;
  }
  const normalized = value.trim();
  return exportDimensions.find((dimension) => dimension === normalized) ?? null;
};

interface ErrorResponse {
  status: number;
  body: { code: string; message: string };
}

export const toErrorResponse = (error: unknown): ErrorResponse => {
  if (error instanceof DatasetError) {
    return { status: 503, body: { code: error.code, message: error.message } };
  }
  return { status: 500, body: { code: 'dashboard-error', message: 'Unable to build the dashboard.' } };
};

const handleError = (error: unknown, res: Response) => {
  const { status, body } = toErrorResponse(error);
  res.status(status).json(body);
};

router.get('/', async (req, res) => {
  try {
    const dashboard = await dashboardService.getDashboard(resolveYearSelection(req.query.year));
    res.json(dashboard);
  } catch (error) {
    console.error('Failed to build the sales dashboard:', error);
    handleError(error, res);
  }
});

router.get('/years', async (_req, res) => {
  try {
    const years = await dashboardService.getYears();
    res.json({ years });
  } catch (error) {
    console.error('Failed to list dashboard years:', error);
    handleError(error, res);
  }
});

router.get('/export/:measure/:dimension', async (req, res) => {
  const measure = resolveMeasure(req.params.measure);
  const dimension = resolveExportDimension(req.params.dimension);
  if (!measure || !dimension) {
    res.status(404).json({ code: 'not-found', message: 'Unknown breakdown for export.' });
    return;
  }

  try {
    const year = resolveYearSelection(req.query.year);
    const csv = await dashboardService.exportBreakdown(measure, dimension, year);
    res.setHeader('Content-Type', 'text/csv; charset=utf-8');
    res.setHeader('Content-Disposition', `attachment; filename="${measure}-by-${dimension}-${year}.csv"`);
    res.send(`\uFEFF${csv}`);
  } catch (error) {
    console.error('Failed to export dashboard breakdown:', error);
    handleError(error, res);
  }
});

export { router as dashboardRouter };
