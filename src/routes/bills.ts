import fs from 'fs';
import { Router } from 'express';
import multer from 'multer';
import { z } from 'zod';
import { env, parseMemberNames } from '../config/env';
import { allocateCharges, readSummaryRows, sumTotals } from '../services/allocationService';
import {
  createBillFromUpload,
  getBillById,
  getBillCsv,
  getBillSummaryReport,
} from '../services/billService';
import { assertReconciled } from '../services/reconciliationService';

const router = Router();
const upload = multer({ dest: env.uploadDir });

const billIdParamSchema = z.object({
  billId: z.coerce.number().int().positive(),
});

// multipart fields arrive as strings
const uploadFieldsSchema = z.object({
  familyCount: z.coerce.number().int().nonnegative().default(env.familyCount),
  summaryPage: z.coerce.number().int().nonnegative().default(env.summaryPageNumber),
  totalsPage: z.coerce.number().int().nonnegative().default(env.totalsPageNumber),
  planCostForAllMembers: z.enum(['true', 'false']).optional(),
  memberNames: z.string().optional(),
});

const allocateBodySchema = z.object({
  rows: z.array(z.unknown()),
  planCostForAllMembers: z.boolean(),
  memberNames: z.record(z.string(), z.string()).optional(),
  statedTotal: z.number().optional(),
});

router.post('/upload', upload.single('file'), async (req, res, next) => {
  try {
    if (!req.file) {
      res.status(400).json({ message: 'A bill PDF upload is required.' });
      return;
    }

    const fields = uploadFieldsSchema.parse(req.body);
    const bill = await createBillFromUpload({
      storedFilePath: req.file.path,
      originalFilename: req.file.originalname,
      familyCount: fields.familyCount,
      summaryPage: fields.summaryPage,
      totalsPage: fields.totalsPage,
      planCostForAllMembers: fields.planCostForAllMembers
        ? fields.planCostForAllMembers === 'true'
        : env.planCostForAllMembers,
      memberNames: parseMemberNames(fields.memberNames) ?? env.memberNames,
    });

    res.status(201).json(bill);
  } catch (error) {
    // only stored bills keep their upload
    if (req.file) {
      fs.rmSync(req.file.path, { force: true });
    }
    next(error);
  }
});

router.post('/allocate', (req, res, next) => {
  try {
    const body = allocateBodySchema.parse(req.body);
    const rows = readSummaryRows(body.rows);
    const allocations = allocateCharges(rows, {
      planCostForAllMembers: body.planCostForAllMembers,
      memberNames: body.memberNames,
    });
    if (body.statedTotal !== undefined) {
      assertReconciled(allocations, body.statedTotal);
    }
    res.json({ allocations, total: sumTotals(allocations) });
  } catch (error) {
    next(error);
  }
});

router.get('/:billId', (req, res, next) => {
  try {
    const { billId } = billIdParamSchema.parse(req.params);
    const bill = getBillById(billId);
    if (!bill) {
      res.status(404).json({ message: 'Bill not found' });
      return;
    }
    res.json(bill);
  } catch (error) {
    next(error);
  }
});

router.get('/:billId/summary', (req, res, next) => {
  try {
    const { billId } = billIdParamSchema.parse(req.params);
    const report = getBillSummaryReport(billId);
    if (report === null) {
      res.status(404).json({ message: 'Bill not found' });
      return;
    }
    res.type('text/plain').send(report);
  } catch (error) {
    next(error);
  }
});

router.get('/:billId/allocations.csv', (req, res, next) => {
  try {
    const { billId } = billIdParamSchema.parse(req.params);
    const csv = getBillCsv(billId);
    if (csv === null) {
      res.status(404).json({ message: 'Bill not found' });
      return;
    }
    res.type('text/csv').attachment(`bill-${billId}.csv`).send(csv);
  } catch (error) {
    next(error);
  }
});

export default router;
