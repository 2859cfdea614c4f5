import express from 'express';
import type { Request, Response } from 'express';
import multer from 'multer';
import type { DocumentText } from '../../src/types/annotations';
import { asyncHandler, currentNamespace } from '../middleware/requireAuth';
import { decodeText, readTextEntries } from '../services/archive';
import type { AppServices } from '../services/container';
import { InvalidArgumentError } from '../services/errors';

// Multer hands over the multipart filename decoded as latin1.
export function uploadedFilename(file: Pick<Express.Multer.File, 'originalname'>) {
  return Buffer.from(file.originalname, 'latin1').toString('utf8');
}

function toDocumentInput(file: Express.Multer.File) {
  const filename = uploadedFilename(file);
  return { doc_id: filename, filename, text: decodeText(file.buffer) };
}

export function createDocumentsRouter({ documents }: Pick<AppServices, 'documents'>, uploadLimitMb: number) {
  const router = express.Router();
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: uploadLimitMb * 1024 * 1024 } });

  router.post('/upload', upload.single('file'), asyncHandler(async (req: Request, res: Response) => {
    if (!req.file) throw new InvalidArgumentError('file is required');
    const doc = await documents.put(currentNamespace(req), toDocumentInput(req.file));
    console.log(`Uploaded "${doc.doc_id}" (${doc.text.length} chars)`);
    res.json({ status: 'uploaded', doc_id: doc.doc_id });
  }));

  router.post('/upload-zip', upload.single('file'), asyncHandler(async (req: Request, res: Response) => {
    if (!req.file) throw new InvalidArgumentError('file is required');
    const entries = await readTextEntries(req.file.buffer);
    const stored = await documents.putMany(
      currentNamespace(req),
      entries.map((entry) => ({ doc_id: entry.name, filename: entry.name, text: entry.text })),
    );
    console.log(`Imported ${stored.length} document(s) from "${uploadedFilename(req.file)}"`);
    res.json({ status: 'uploaded-zip', doc_ids: stored.map((doc) => doc.doc_id) });
  }));

  router.post('/upload-folder', upload.array('files'), asyncHandler(async (req: Request, res: Response) => {
    const files = Array.isArray(req.files) ? req.files : [];
    if (files.length === 0) throw new InvalidArgumentError('files are required');
    const stored = await documents.putMany(currentNamespace(req), files.map(toDocumentInput));
    console.log(`Uploaded ${stored.length} document(s) from folder`);
    res.json({ status: 'folder-uploaded', doc_ids: stored.map((doc) => doc.doc_id) });
  }));

  router.get('/documents', asyncHandler(async (req: Request, res: Response) => {
    res.json(await documents.list(currentNamespace(req)));
  }));

  router.get('/document/:docId', asyncHandler(async (req: Request, res: Response) => {
    const docId = req.params.docId;
    const body: DocumentText = { doc_id: docId, text: await documents.getText(currentNamespace(req), docId) };
    res.json(body);
  }));

  return router;
}

export default createDocumentsRouter;
