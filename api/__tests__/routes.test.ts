import type { Server } from 'http';
import axios, { type AxiosInstance, type Method } from 'axios';
import JSZip from 'jszip';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { createApp } from '../express';
import { createServices } from '../services/container';
import { makeTempDir, removeTempDir } from './helpers';

let dataDir: string;
let server: Server;
let api: AxiosInstance;

function authed(token: string) {
  return { headers: { Authorization: `Bearer ${token}` } };
}

async function registerAndLogin(username: string) {
  await api.post('/auth/register', { username, password: 'test-password' });
  const res = await api.post('/auth/login', { username, password: 'test-password' });
  const token: string = res.data.token;
  return token;
}

function textUpload(field: string, files: Record<string, string>) {
  const form = new FormData();
  for (const [name, text] of Object.entries(files)) {
    form.append(field, new Blob([text], { type: 'text/plain' }), name);
  }
  return form;
}

beforeAll(async () => {
  dataDir = await makeTempDir();
  const app = createApp(createServices(dataDir), { corsOrigin: '*', uploadLimitMb: 1 });
  server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('server is not listening on a TCP port');
  api = axios.create({ baseURL: `http://127.0.0.1:${address.port}`, validateStatus: () => true });
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  await removeTempDir(dataDir);
});

describe('health', () => {
  it('answers without a token', async () => {
    const res = await api.get('/health');
    expect(res.status).toBe(200);
    expect(res.data.status).toBe('healthy');
  });
});

describe('auth routes', () => {
  it('registers, rejects duplicates and logs in', async () => {
    const created = await api.post('/auth/register', { username: 'carol', password: 'test-password' });
    expect(created.status).toBe(201);
    expect(created.data).toEqual({ status: 'registered', username: 'carol' });

    const duplicate = await api.post('/auth/register', { username: 'carol', password: 'other' });
    expect(duplicate.status).toBe(409);

    const login = await api.post('/auth/login', { username: 'carol', password: 'test-password' });
    expect(login.status).toBe(200);
    expect(login.data.username).toBe('carol');
    expect(login.data.token).toMatch(/^[0-9a-f]{64}$/);
  });

  it('rejects blank registration fields as a conflict', async () => {
    const res = await api.post('/auth/register', { username: '  ', password: 'test-password' });
    expect(res.status).toBe(409);
  });

  it('rejects a request without the credential fields', async () => {
    const res = await api.post('/auth/register', { username: 'dave' });
    expect(res.status).toBe(400);
    expect(res.data.error).toBe('Invalid request');
    expect(res.data.details).toEqual([{ path: 'password', message: 'password is required' }]);
  });

  it('rejects a wrong password', async () => {
    await api.post('/auth/register', { username: 'erin', password: 'test-password' });
    const res = await api.post('/auth/login', { username: 'erin', password: 'nope' });
    expect(res.status).toBe(401);
    expect(res.data).toEqual({ error: 'Invalid username or password' });
  });
});

const gatedRoutes: Array<[Method, string]> = [
  ['get', '/documents'],
  ['get', '/document/a.txt'],
  ['get', '/annotations/a.txt'],
  ['delete', '/annotations/a.txt/0'],
  ['post', '/save-annotation'],
  ['get', '/labels'],
  ['post', '/labels'],
  ['delete', '/labels/PER'],
  ['post', '/upload'],
  ['get', '/export-json/a.txt'],
  ['get', '/export-word/a.txt'],
];

describe('auth gate', () => {
  it.each(gatedRoutes)('%s %s requires a session', async (method, url) => {
    const res = await api.request({ method, url });
    expect(res.status).toBe(401);
    expect(res.data).toEqual({ error: 'Invalid or missing session token' });
  });

  it('rejects a token that was never issued', async () => {
    const res = await api.get('/documents', authed('0'.repeat(64)));
    expect(res.status).toBe(401);
  });
});

describe('documents, annotations and labels', () => {
  let alice: string;
  let bob: string;

  beforeAll(async () => {
    alice = await registerAndLogin('alice');
    bob = await registerAndLogin('bob');
  });

  it('uploads a single file and lists it with a preview', async () => {
    const upload = await api.post('/upload', textUpload('file', { 'notes.txt': 'Alice met Bob\nin Paris.' }), authed(alice));
    expect(upload.status).toBe(200);
    expect(upload.data).toEqual({ status: 'uploaded', doc_id: 'notes.txt' });

    const list = await api.get('/documents', authed(alice));
    expect(list.data).toEqual([
      { doc_id: 'notes.txt', filename: 'notes.txt', text: 'Alice met Bob\nin Paris.', preview: 'Alice met Bob in Paris.' },
    ]);

    const doc = await api.get('/document/notes.txt', authed(alice));
    expect(doc.data).toEqual({ doc_id: 'notes.txt', text: 'Alice met Bob\nin Paris.' });
  });

  it('rejects an upload without a file', async () => {
    const form = new FormData();
    form.append('note', 'no file attached');
    const res = await api.post('/upload', form, authed(alice));
    expect(res.status).toBe(400);
    expect(res.data).toEqual({ error: 'file is required' });
  });

  it('uploads a batch of files', async () => {
    const res = await api.post('/upload-folder', textUpload('files', { 'one.txt': 'first', 'two.txt': 'second' }), authed(alice));
    expect(res.data).toEqual({ status: 'folder-uploaded', doc_ids: ['one.txt', 'two.txt'] });
  });

  it('imports the text entries of a zip archive', async () => {
    const zip = new JSZip();
    zip.file('batch/c.txt', 'from the archive');
    zip.file('batch/cover.png', new Uint8Array([1, 2, 3]));
    const bytes = await zip.generateAsync({ type: 'uint8array' });
    const form = new FormData();
    form.append('file', new Blob([bytes], { type: 'application/zip' }), 'batch.zip');

    const res = await api.post('/upload-zip', form, authed(alice));
    expect(res.data).toEqual({ status: 'uploaded-zip', doc_ids: ['batch/c.txt'] });

    const doc = await api.get(`/document/${encodeURIComponent('batch/c.txt')}`, authed(alice));
    expect(doc.data).toEqual({ doc_id: 'batch/c.txt', text: 'from the archive' });
  });

  it('rejects a zip upload that is not an archive', async () => {
    const res = await api.post('/upload-zip', textUpload('file', { 'fake.zip': 'not a zip' }), authed(alice));
    expect(res.status).toBe(400);
  });

  it('answers 404 for an unknown document', async () => {
    const res = await api.get('/document/missing.txt', authed(alice));
    expect(res.status).toBe(404);
  });

  it('reconciles overlapping spans on save', async () => {
    await api.post('/save-annotation', { doc_id: 'span.txt', start: 0, end: 10, text: 'Alice met ', label: 'A' }, authed(alice));
    const res = await api.post(
      '/save-annotation',
      { doc_id: 'span.txt', start: 3, end: 7, text: 'ce m', label: 'B', rank: '2' },
      authed(alice),
    );

    expect(res.status).toBe(200);
    expect(res.data).toEqual({
      status: 'saved',
      annotations: [{ start: 3, end: 7, text: 'ce m', label: 'B', rank: '2' }],
    });
  });

  it('accepts form-encoded saves and coerces offsets', async () => {
    const form = new URLSearchParams({ doc_id: 'notes.txt', start: '0', end: '5', text: 'Alice', label: 'PER', rank: '' });
    const first = await api.post('/save-annotation', form, authed(alice));
    expect(first.status).toBe(200);

    await api.post('/save-annotation', { doc_id: 'notes.txt', start: 5, end: 9, text: ' met', label: 'VERB' }, authed(alice));

    const list = await api.get('/annotations/notes.txt', authed(alice));
    expect(list.data).toEqual([
      { start: 0, end: 5, text: 'Alice', label: 'PER', rank: null },
      { start: 5, end: 9, text: ' met', label: 'VERB', rank: null },
    ]);
  });

  it('rejects an empty span', async () => {
    const res = await api.post('/save-annotation', { doc_id: 'x.txt', start: 4, end: 4, text: '', label: 'A' }, authed(alice));
    expect(res.status).toBe(400);
    expect(res.data).toEqual({ error: 'start must be less than end' });
  });

  it('rejects blank or null offsets instead of reading them as 0', async () => {
    await api.post('/save-annotation', { doc_id: 'blank.txt', start: 2, end: 6, text: 'kept', label: 'A' }, authed(alice));

    const blank = await api.post(
      '/save-annotation',
      new URLSearchParams({ doc_id: 'blank.txt', start: '', end: '5', text: 'x', label: 'B' }),
      authed(alice),
    );
    expect(blank.status).toBe(400);
    expect(blank.data.error).toBe('Invalid request');

    const nulled = await api.post('/save-annotation', { doc_id: 'blank.txt', start: null, end: 5, text: 'x', label: 'B' }, authed(alice));
    expect(nulled.status).toBe(400);

    expect((await api.get('/annotations/blank.txt', authed(alice))).data).toEqual([
      { start: 2, end: 6, text: 'kept', label: 'A', rank: null },
    ]);
  });

  it('rejects non-numeric offsets', async () => {
    const res = await api.post('/save-annotation', { doc_id: 'x.txt', start: 'abc', end: 4, text: '', label: 'A' }, authed(alice));
    expect(res.status).toBe(400);
    expect(res.data.error).toBe('Invalid request');
  });

  it('deletes by index within bounds only', async () => {
    await api.post('/save-annotation', { doc_id: 'del.txt', start: 0, end: 2, text: 'ab', label: 'X' }, authed(alice));
    await api.post('/save-annotation', { doc_id: 'del.txt', start: 4, end: 6, text: 'ef', label: 'Y' }, authed(alice));

    expect((await api.delete('/annotations/del.txt/2', authed(alice))).status).toBe(404);
    expect((await api.delete('/annotations/del.txt/-1', authed(alice))).status).toBe(404);
    expect((await api.delete('/annotations/del.txt/abc', authed(alice))).status).toBe(400);
    expect((await api.delete('/annotations/never.txt/0', authed(alice))).status).toBe(404);

    const removed = await api.delete('/annotations/del.txt/0', authed(alice));
    expect(removed.data).toEqual({ status: 'annotation deleted' });
    expect((await api.get('/annotations/del.txt', authed(alice))).data).toEqual([
      { start: 4, end: 6, text: 'ef', label: 'Y', rank: null },
    ]);
  });

  it('manages a label palette', async () => {
    expect((await api.post('/labels', { name: 'PER', color: '#ff0000' }, authed(alice))).data).toEqual({ status: 'label saved' });
    await api.post('/labels', new URLSearchParams({ name: 'LOC', color: 'blue' }), authed(alice));
    await api.post('/labels', { name: 'PER', color: '#00ff00' }, authed(alice));

    expect((await api.get('/labels', authed(alice))).data).toEqual({ PER: '#00ff00', LOC: 'blue' });

    expect((await api.delete('/labels/ORG', authed(alice))).status).toBe(404);
    expect((await api.delete('/labels/PER', authed(alice))).data).toEqual({ status: 'label deleted' });
    expect((await api.get('/labels', authed(alice))).data).toEqual({ LOC: 'blue' });
  });

  it('keeps a non-ASCII upload filename intact', async () => {
    const upload = await api.post('/upload', textUpload('file', { 'résumé.txt': 'curriculum' }), authed(alice));
    expect(upload.data).toEqual({ status: 'uploaded', doc_id: 'résumé.txt' });

    const doc = await api.get(`/document/${encodeURIComponent('résumé.txt')}`, authed(alice));
    expect(doc.data).toEqual({ doc_id: 'résumé.txt', text: 'curriculum' });
  });

  it('keeps users isolated for the same doc_id', async () => {
    await api.post('/upload', textUpload('file', { 'notes.txt': 'Bob only' }), authed(bob));

    expect((await api.get('/document/notes.txt', authed(bob))).data.text).toBe('Bob only');
    expect((await api.get('/document/notes.txt', authed(alice))).data.text).toBe('Alice met Bob\nin Paris.');
    expect((await api.get('/annotations/notes.txt', authed(bob))).data).toEqual([]);
    expect((await api.get('/labels', authed(bob))).data).toEqual({});
  });

  it('exports annotations as a JSON attachment', async () => {
    const res = await api.get('/export-json/del.txt', { ...authed(alice), responseType: 'text' });

    expect(res.status).toBe(200);
    expect(res.headers['content-disposition']).toBe('attachment; filename="del.txt_annotations.json"');
    expect(res.data).toBe(JSON.stringify([{ start: 4, end: 6, text: 'ef', label: 'Y', rank: null }], null, 2));
  });

  it('exports annotations as a Word attachment', async () => {
    const res = await api.get('/export-word/notes.txt', { ...authed(alice), responseType: 'arraybuffer' });

    expect(res.status).toBe(200);
    expect(res.headers['content-disposition']).toBe('attachment; filename="notes.txt_annotations.docx"');
    const zip = await JSZip.loadAsync(res.data);
    const xml = await zip.file('word/document.xml')?.async('string');
    expect(xml).toContain('[PER] Alice (Rank=)');
  });

  it('refuses a Word export for an unknown document', async () => {
    const res = await api.get('/export-word/missing.txt', authed(alice));
    expect(res.status).toBe(404);
    expect(res.data).toEqual({ error: 'Document "missing.txt" not found' });
  });
});
