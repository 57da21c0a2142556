/**
 * File-system Lister Tests
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { createDefaultConfig, ListError, processPath } from '@expedientes/shared';
import { FsFileLister } from '../../packages/runtime/src/file-lister';
import { fakeContext, FakeLoader } from './fakes';

describe('FsFileLister', () => {
  let root: string;
  const lister = new FsFileLister(['.png', '.jpg', '.pdf', '.tiff']);

  beforeAll(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'expedientes-in-'));
    await fs.mkdir(path.join(root, 'sub', 'deeper'), { recursive: true });
    await Promise.all(
      ['a.png', 'B.PDF', 'notes.txt', path.join('sub', 'c.jpg'), path.join('sub', 'deeper', 'd.TIFF')].map((name) =>
        fs.writeFile(path.join(root, name), '')
      )
    );
  });

  afterAll(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('lists supported files recursively, sorted by path', async () => {
    const listed = await lister.listSupportedFiles(root);

    expect(listed).toEqual({
      ok: true,
      value: [
        path.join(root, 'B.PDF'),
        path.join(root, 'a.png'),
        path.join(root, 'sub', 'c.jpg'),
        path.join(root, 'sub', 'deeper', 'd.TIFF'),
      ],
    });
  });

  it('matches extensions without regard to case', () => {
    expect(lister.isSupported('scan.PNG')).toBe(true);
    expect(lister.isSupported('scan.bmp')).toBe(false);
  });

  it('inspects files, directories and missing paths', async () => {
    await expect(lister.inspectPath(path.join(root, 'a.png'))).resolves.toBe('file');
    await expect(lister.inspectPath(root)).resolves.toBe('directory');
    await expect(lister.inspectPath(path.join(root, 'absent.png'))).resolves.toBe('missing');
    await expect(lister.inspectPath(path.join(root, 'a.png', 'child'))).resolves.toBe('missing');
  });

  it('reports a directory it cannot read', async () => {
    const listed = await lister.listSupportedFiles(path.join(root, 'absent'));

    expect(listed.ok).toBe(false);
    if (!listed.ok) {
      expect(listed.error).toBeInstanceOf(ListError);
      expect(listed.error.message.startsWith(`Cannot list ${path.join(root, 'absent')}:`)).toBe(true);
    }
  });

  it('feeds only supported files to the pipeline, in path order', async () => {
    const batch = path.join(root, 'batch');
    await fs.mkdir(batch);
    await Promise.all(['y.jpg', 'x.png', 'z.txt'].map((name) => fs.writeFile(path.join(batch, name), '')));
    const first = path.join(batch, 'x.png');
    const second = path.join(batch, 'y.jpg');
    const context = fakeContext({ lister, loader: new FakeLoader({ [first]: 1, [second]: 1 }) });

    const results = await processPath(batch, context, createDefaultConfig());

    expect(results.map((result) => result.source_path)).toEqual([first, second]);
    expect(results.map((result) => result.processing_errors)).toEqual([[], []]);
  });
});
