import express, { Request } from 'express';
import cors from 'cors';
import multer from 'multer';
import morgan from 'morgan';
import { z } from 'zod';

import { DataFormatError, NotFoundError } from './errors';
import { errorHandler } from './middleware/error-handler';
import { isSeriesKey } from './reference/series';
import { prodTable, rawSchema, stageSchema, statusOf } from './schemas';
import { RecordKey, StagingService } from './service';
import { asyncHandler } from './utils/async-handler';

const flag = z.enum(['true', 'false']).transform(value => value === 'true');

const verifiedQuery = z.object({ verified: flag.default('true') });

const keyQuery = z.object({
  project_id: z.string().trim().min(1),
  sample: z.string().trim().min(1)
});

const recordBody = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));

const overwriteField = z.object({ overwrite: flag.default('false') });

const referenceBody = z.array(
  z.object({
    country_iso3: z
      .string()
      .trim()
      .regex(/^[A-Za-z]{3}$/, 'must be an ISO3 country code')
      .transform(value => value.toUpperCase()),
    year: z.coerce.number().int(),
    value: z.coerce.number()
  })
);

const statusFrom = (req: Request) => statusOf(verifiedQuery.parse(req.query).verified);

const keyFrom = (req: Request): RecordKey => keyQuery.parse(req.query);

const seriesFrom = (req: Request) => {
  const { series } = req.params;
  if (!isSeriesKey(series)) throw new NotFoundError(`Unknown reference series '${series}'`);
  return series;
};

export type AppOptions = {
  /** HTTP access log format for morgan; omit to disable request logging. */
  accessLog?: string;
};

export const createApp = (service: StagingService, options: AppOptions = {}) => {
  const app = express();
  const upload = multer({ storage: multer.memoryStorage() });
  const api = express.Router();
  const files = service.store;

  app.use(cors());
  app.use(express.json({ limit: '5mb' }));
  if (options.accessLog) app.use(morgan(options.accessLog));

  api.get(
    '/health',
    asyncHandler(async (_req, res) => {
      res.json(await service.health());
    })
  );

  // asset classes and files

  api.get(
    '/assetClasses',
    asyncHandler(async (req, res) => {
      res.json({ assetClasses: await files.listAssetClasses(statusFrom(req)) });
    })
  );

  api.post(
    '/assetClasses/:assetClass',
    asyncHandler(async (req, res) => {
      await files.createAssetClass(statusFrom(req), req.params.assetClass);
      res.status(201).json({ assetClass: req.params.assetClass });
    })
  );

  api.delete(
    '/assetClasses/:assetClass',
    asyncHandler(async (req, res) => {
      await files.deleteAssetClass(statusFrom(req), req.params.assetClass);
      res.json({ ok: true });
    })
  );

  api.get(
    '/assetClasses/:assetClass/files',
    asyncHandler(async (req, res) => {
      res.json({ files: await files.listFiles(statusFrom(req), req.params.assetClass) });
    })
  );

  api.post(
    '/files/:assetClass',
    upload.single('file'),
    asyncHandler(async (req, res) => {
      const file = req.file;
      if (!file) throw new DataFormatError("Multipart field 'file' is required");
      const { overwrite } = overwriteField.parse({ ...req.query, ...req.body });
      await files.saveFile(statusFrom(req), req.params.assetClass, file.originalname, file.buffer, overwrite);
      res.status(201).json({ fileName: file.originalname, size: file.size });
    })
  );

  api.get(
    '/files/:assetClass/:fileName',
    asyncHandler(async (req, res) => {
      const { assetClass, fileName } = req.params;
      const buffer = await files.readFile(statusFrom(req), assetClass, fileName);
      res.attachment(fileName);
      res.send(buffer);
    })
  );

  api.delete(
    '/files/:assetClass/:fileName',
    asyncHandler(async (req, res) => {
      await files.deleteFile(statusFrom(req), req.params.assetClass, req.params.fileName);
      res.json({ ok: true });
    })
  );

  // raw tables

  api.get(
    '/rawTables',
    asyncHandler(async (req, res) => {
      res.json({ tables: await service.listRawTables(statusFrom(req)) });
    })
  );

  api.post(
    '/rawTables/:assetClass/:fileName/load',
    asyncHandler(async (req, res) => {
      res.json(await service.loadRaw(statusFrom(req), req.params.assetClass, req.params.fileName));
    })
  );

  api.get(
    '/rawTables/:table',
    asyncHandler(async (req, res) => {
      res.json({ rows: await service.select(req.params.table, rawSchema(statusFrom(req))) });
    })
  );

  api.delete(
    '/rawTables/:table',
    asyncHandler(async (req, res) => {
      await service.dropRaw(statusFrom(req), req.params.table);
      res.json({ ok: true });
    })
  );

  api.get(
    '/rawTables/:table/record',
    asyncHandler(async (req, res) => {
      const record = await service.selectById(req.params.table, rawSchema(statusFrom(req)), keyFrom(req));
      if (!record) throw new NotFoundError('Record not found');
      res.json({ record });
    })
  );

  api.post(
    '/rawTables/:table/record',
    asyncHandler(async (req, res) => {
      res.status(201).json(await service.addRecord(statusFrom(req), req.params.table, recordBody.parse(req.body)));
    })
  );

  api.put(
    '/rawTables/:table/record',
    asyncHandler(async (req, res) => {
      res.json(await service.updateRecord(statusFrom(req), req.params.table, keyFrom(req), recordBody.parse(req.body)));
    })
  );

  api.delete(
    '/rawTables/:table/record',
    asyncHandler(async (req, res) => {
      res.json(await service.deleteRecord(statusFrom(req), req.params.table, keyFrom(req)));
    })
  );

  // staged tables

  api.get(
    '/stageTables',
    asyncHandler(async (req, res) => {
      res.json({ tables: await service.listStageTables(statusFrom(req)) });
    })
  );

  api.post(
    '/stageTables/:assetClass/update',
    asyncHandler(async (req, res) => {
      res.json(await service.stage(statusFrom(req), req.params.assetClass));
    })
  );

  api.get(
    '/stageTables/:assetClass',
    asyncHandler(async (req, res) => {
      res.json({ rows: await service.select(req.params.assetClass, stageSchema(statusFrom(req))) });
    })
  );

  api.delete(
    '/stageTables/:assetClass',
    asyncHandler(async (req, res) => {
      await service.dropStage(statusFrom(req), req.params.assetClass);
      res.json({ ok: true });
    })
  );

  api.get(
    '/stageTables/:assetClass/record',
    asyncHandler(async (req, res) => {
      const record = await service.selectById(req.params.assetClass, stageSchema(statusFrom(req)), keyFrom(req));
      if (!record) throw new NotFoundError('Record not found');
      res.json({ record });
    })
  );

  api.get(
    '/stageTables/:assetClass/ratioFields',
    asyncHandler(async (req, res) => {
      res.json({ fields: await service.ratioFields(statusFrom(req), req.params.assetClass) });
    })
  );

  // reference data

  api.post(
    '/reference/:series/update',
    asyncHandler(async (req, res) => {
      res.json(await service.refreshReference(seriesFrom(req)));
    })
  );

  api.put(
    '/reference/:series',
    asyncHandler(async (req, res) => {
      const series = seriesFrom(req);
      const records = referenceBody.parse(req.body);
      res.json(await service.replaceReference(series, records));
    })
  );

  // production

  api.get(
    '/prod',
    asyncHandler(async (req, res) => {
      const target = prodTable(statusFrom(req));
      res.json({ rows: await service.select(target.name, target.schema) });
    })
  );

  api.post(
    '/prod/update',
    asyncHandler(async (req, res) => {
      res.json(await service.promote(statusFrom(req)));
    })
  );

  app.use('/api/v1/data', api);
  app.use(errorHandler);

  return app;
};
