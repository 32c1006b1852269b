import fs from 'fs';
import path from 'path';
import JSZip from 'jszip';
import { extractArchive, resolveEntryPath } from '../archive-ingestor';
import { makeTempDir } from './fixtures/dicom-fixtures';

async function zipOf(entries: Record<string, string | Buffer>): Promise<Buffer> {
  const zip = new JSZip();
  for (const [name, data] of Object.entries(entries)) {
    zip.file(name, data, { createFolders: false });
  }
  return zip.generateAsync({ type: 'nodebuffer' });
}

describe('archive ingestion', () => {
  let dir: string;
  let target: string;

  beforeEach(() => {
    dir = makeTempDir();
    target = path.join(dir, 'out');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('resolveEntryPath', () => {
    it('should resolve nested names inside the target', () => {
      expect(resolveEntryPath('/data/job', 'series/IM0001')).toBe(path.resolve('/data/job/series/IM0001'));
    });

    it('should reject names that escape or equal the target', () => {
      expect(resolveEntryPath('/data/job', '../other/file')).toBeNull();
      expect(resolveEntryPath('/data/job', 'a/../../x')).toBeNull();
      expect(resolveEntryPath('/data/job', '/etc/passwd')).toBeNull();
      expect(resolveEntryPath('/data/job', '.')).toBeNull();
      expect(resolveEntryPath('/data/job', '../jobx/file')).toBeNull();
    });
  });

  describe('extractArchive', () => {
    it('should extract nested entries from archive bytes', async () => {
      const bytes = await zipOf({ 'series/IM0001': 'one', 'series/deeper/IM0002': 'two' });

      const summary = await extractArchive({ name: 'upload.zip', bytes }, target);

      expect(summary.error).toBeUndefined();
      expect(summary.skipped).toEqual([]);
      expect(summary.extracted).toEqual([
        path.join(target, 'series', 'IM0001'),
        path.join(target, 'series', 'deeper', 'IM0002'),
      ]);
      expect(fs.readFileSync(path.join(target, 'series', 'deeper', 'IM0002'), 'utf-8')).toBe('two');
    });

    it('should skip every entry that would land outside the target and keep going', async () => {
      const absolute = path.join(dir, 'absolute.txt');
      const bytes = await zipOf({
        '../escape.txt': 'nope',
        [absolute]: 'nope',
        'a/../../nested.txt': 'nope',
        'safe.txt': 'ok',
      });

      const summary = await extractArchive({ name: 'upload.zip', bytes }, target);

      const reason = 'resolves outside the target directory';
      expect(summary.skipped).toEqual([
        { entryName: '../escape.txt', reason },
        { entryName: absolute, reason },
        { entryName: 'a/../../nested.txt', reason },
      ]);
      expect(summary.extracted).toEqual([path.join(target, 'safe.txt')]);
      expect(fs.readdirSync(dir)).toEqual(['out']);
      expect(fs.readdirSync(target)).toEqual(['safe.txt']);
    });

    it('should remove the output of an entry that fails to inflate', async () => {
      const zip = new JSZip();
      zip.file('good.txt', 'fine');
      zip.file('bad.bin', Array.from({ length: 2000 }, (_, i) => i * 7).join(','));
      const bytes = await zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });

      // first occurrence of the name is in the local file header
      const nameOffset = bytes.indexOf('bad.bin');
      const header = nameOffset - 30;
      const dataStart = nameOffset + bytes.readUInt16LE(header + 26) + bytes.readUInt16LE(header + 28);
      bytes.fill(0xff, dataStart, dataStart + 8);

      const summary = await extractArchive({ name: 'upload.zip', bytes }, target);

      expect(summary.extracted).toEqual([path.join(target, 'good.txt')]);
      expect(summary.skipped.map((entry) => entry.entryName)).toEqual(['bad.bin']);
      expect(fs.readdirSync(target)).toEqual(['good.txt']);
    });

    it('should read an archive from a path', async () => {
      const zipPath = path.join(dir, 'upload.zip');
      fs.writeFileSync(zipPath, await zipOf({ 'IM0001': 'one' }));

      const summary = await extractArchive(zipPath, target);

      expect(summary.extracted).toEqual([path.join(target, 'IM0001')]);
    });

    it('should report an unreadable archive without rejecting', async () => {
      const summary = await extractArchive({ name: 'bad.zip', bytes: Buffer.from('not a zip archive') }, target);

      expect(summary.extracted).toEqual([]);
      expect(summary.error).toEqual(expect.any(String));
    });
  });
});
