import { randomUUID } from 'node:crypto';
import { Router, type Request, type Response } from 'express';
import { verifyGridsInput, verifyWorkbooksInput, workbookColumnsInput } from '../../domain/schemas.js';
import { successResponse, sendAppError, sendValidationError } from '../middleware/error-handler.js';
import { verify } from '../../services/verification/index.js';
import { listWorkbookColumns, verifyWorkbooks } from '../../services/workbook-verification/index.js';
import { reportToCsv } from '../../services/report/index.js';

const router = Router();

router.post('/verifications', (req: Request, res: Response) => {
  const parsed = verifyGridsInput.safeParse(req.body);
  if (!parsed.success) return sendValidationError(res, parsed.error);

  const { source, target, columns } = parsed.data;
  const result = verify(source, target, columns, { runId: randomUUID() });
  if (!result.ok) return sendAppError(res, result.error);

  res.json(successResponse(result.value));
});

router.post('/verifications/workbooks', (req: Request, res: Response) => {
  const parsed = verifyWorkbooksInput.safeParse(req.body);
  if (!parsed.success) return sendValidationError(res, parsed.error);

  const input = parsed.data;
  const result = verifyWorkbooks({
    source: input.sourceBase64,
    target: input.targetBase64,
    sourceSheet: input.sourceSheet,
    targetSheet: input.targetSheet,
    sourceName: input.sourceFilename,
    targetName: input.targetFilename,
    columns: input.columns,
    runId: randomUUID(),
  });
  if (!result.ok) return sendAppError(res, result.error);

  if (req.query.format === 'csv') {
    res
      .status(200)
      .type('text/csv')
      .attachment('mismatch_report.csv')
      .send(reportToCsv(result.value));
    return;
  }

  res.json(successResponse(result.value));
});

router.post('/workbooks/columns', (req: Request, res: Response) => {
  const parsed = workbookColumnsInput.safeParse(req.body);
  if (!parsed.success) return sendValidationError(res, parsed.error);

  const input = parsed.data;
  const result = listWorkbookColumns({
    source: input.sourceBase64,
    target: input.targetBase64,
    sourceSheet: input.sourceSheet,
    targetSheet: input.targetSheet,
    sourceName: input.sourceFilename,
    targetName: input.targetFilename,
  });
  if (!result.ok) return sendAppError(res, result.error);

  res.json(successResponse(result.value));
});

export { router as verificationRouter };
