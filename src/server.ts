import express from 'express';
import { Server } from 'http';
import { z } from 'zod';
import { AddressBook } from './address-book';
import { parseBirthday } from './birthday';
import { ContactBookError, NotFoundError } from './errors';
import { ContactRecord, createRecord } from './record';
import { AppConfig } from './types';

const CreateContactBody = z.object({
  name: z.string(),
  phones: z.array(z.string()).optional(),
  birthday: z.string().optional(),
});

const PhoneBody = z.object({ phone: z.string() });

const BirthdayBody = z.object({ birthday: z.string() });

const MAX_HORIZON_DAYS = 366;

const UpcomingQuery = z.object({
  today: z.string().optional(),
  days: z
    .string()
    .regex(/^\d+$/, 'days must be a non-negative integer')
    .transform((v) => parseInt(v, 10))
    .refine((n) => n <= MAX_HORIZON_DAYS, `days must be at most ${MAX_HORIZON_DAYS}`)
    .optional(),
});

function sendError(res: express.Response, error: ContactBookError): void {
  res.status(error.isValidation() ? 400 : 404).json({ error: error.message });
}

function sendBadRequest(res: express.Response, error: z.ZodError): void {
  const issue = error.issues[0];
  const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
  res.status(400).json({ error: `${where}${issue?.message ?? 'Invalid request.'}` });
}

function findContact(
  book: AddressBook,
  name: string,
  res: express.Response
): ContactRecord | undefined {
  const record = book.findRecord(name);
  if (!record) {
    sendError(res, new NotFoundError('Contact'));
  }
  return record;
}

export function createApp(
  book: AddressBook,
  config: Pick<AppConfig, 'horizonDays'>
): express.Express {
  const app = express();
  app.use(express.json());

  // ─── Status ─────────────────────────────────────────────────────

  app.get('/api/status', (_req, res) => {
    res.json({
      contactCount: book.size,
      upcomingCount: book.getUpcomingBirthdays(new Date(), config.horizonDays).length,
      horizonDays: config.horizonDays,
    });
  });

  // ─── Contacts ───────────────────────────────────────────────────

  app.get('/api/contacts', (_req, res) => {
    res.json(book.records());
  });

  app.post('/api/contacts', (req, res) => {
    const body = CreateContactBody.safeParse(req.body);
    if (!body.success) {
      sendBadRequest(res, body.error);
      return;
    }
    const { name, phones = [], birthday } = body.data;

    const created = createRecord(name, birthday);
    if (!created.success) {
      sendError(res, created.error);
      return;
    }

    // the contact only replaces an existing one once every phone is valid
    for (const phone of phones) {
      const added = created.value.addPhone(phone);
      if (!added.success) {
        sendError(res, added.error);
        return;
      }
    }

    book.addRecord(created.value);
    res.status(201).json(created.value);
  });

  app.get('/api/contacts/:name', (req, res) => {
    const record = findContact(book, req.params.name, res);
    if (record) res.json(record);
  });

  app.delete('/api/contacts/:name', (req, res) => {
    if (!book.delete(req.params.name)) {
      sendError(res, new NotFoundError('Contact'));
      return;
    }
    res.json({ success: true });
  });

  // ─── Phones ─────────────────────────────────────────────────────

  app.post('/api/contacts/:name/phones', (req, res) => {
    const record = findContact(book, req.params.name, res);
    if (!record) return;

    const body = PhoneBody.safeParse(req.body);
    if (!body.success) {
      sendBadRequest(res, body.error);
      return;
    }

    const added = record.addPhone(body.data.phone);
    if (!added.success) {
      sendError(res, added.error);
      return;
    }
    res.status(201).json(record);
  });

  app.put('/api/contacts/:name/phones/:phone', (req, res) => {
    const record = findContact(book, req.params.name, res);
    if (!record) return;

    const body = PhoneBody.safeParse(req.body);
    if (!body.success) {
      sendBadRequest(res, body.error);
      return;
    }

    const edited = record.editPhone(req.params.phone, body.data.phone);
    if (!edited.success) {
      sendError(res, edited.error);
      return;
    }
    if (!edited.value) {
      sendError(res, new NotFoundError('Phone number'));
      return;
    }
    res.json(record);
  });

  app.delete('/api/contacts/:name/phones/:phone', (req, res) => {
    const record = findContact(book, req.params.name, res);
    if (!record) return;

    const removed = record.removePhone(req.params.phone);
    if (removed === 0) {
      sendError(res, new NotFoundError('Phone number'));
      return;
    }
    res.json({ removed });
  });

  // ─── Birthdays ──────────────────────────────────────────────────

  app.put('/api/contacts/:name/birthday', (req, res) => {
    const record = findContact(book, req.params.name, res);
    if (!record) return;

    const body = BirthdayBody.safeParse(req.body);
    if (!body.success) {
      sendBadRequest(res, body.error);
      return;
    }

    const added = record.addBirthday(body.data.birthday);
    if (!added.success) {
      sendError(res, added.error);
      return;
    }
    res.json(record);
  });

  app.get('/api/birthdays/upcoming', (req, res) => {
    const query = UpcomingQuery.safeParse(req.query);
    if (!query.success) {
      sendBadRequest(res, query.error);
      return;
    }

    let today = new Date();
    if (query.data.today !== undefined) {
      const parsed = parseBirthday(query.data.today);
      if (!parsed.success) {
        sendError(res, parsed.error);
        return;
      }
      today = parsed.value;
    }

    res.json(book.getUpcomingBirthdays(today, query.data.days ?? config.horizonDays));
  });

  // ─── Fallback error handler ─────────────────────────────────────

  app.use(
    (
      err: unknown,
      _req: express.Request,
      res: express.Response,
      _next: express.NextFunction
    ) => {
      if (err instanceof SyntaxError) {
        res.status(400).json({ error: 'Request body is not valid JSON.' });
        return;
      }
      const errMsg = err instanceof Error ? err.message : String(err);
      console.error('Request error:', errMsg);
      res.status(500).json({ error: 'Internal server error.' });
    }
  );

  return app;
}

export function startServer(book: AddressBook, config: AppConfig): Server {
  const app = createApp(book, config);
  return app.listen(config.port, () => {
    console.log(`\n  birthday-book API running at http://localhost:${config.port}\n`);
  });
}
