import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import { fileToImage, imageToFile, inspectImage } from '../src/convert/index.js';
import { encodePng } from '../src/image/index.js';
import { encodeFrame, packPixels } from '../src/codec/index.js';
import { createTempDir, removeTempDir, randomPayload, fileExists } from './setup.js';

describe('file conversion', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  async function writeBytes(name: string, bytes: Uint8Array): Promise<string> {
    const filePath = path.join(dir, name);
    await fs.writeFile(filePath, bytes);
    return filePath;
  }

  describe('fileToImage / imageToFile', () => {
    it('should restore the original bytes exactly', async () => {
      const payload = randomPayload(20_000);
      const input = await writeBytes('archive.bin', payload);
      const image = path.join(dir, 'archive.png');
      const restored = path.join(dir, 'restored.bin');

      const encoded = await fileToImage(input, image);
      expect(encoded.ok).toBe(true);

      const decoded = await imageToFile(image, restored);
      expect(decoded.ok).toBe(true);

      expect(new Uint8Array(await fs.readFile(restored))).toEqual(payload);
    });

    it('should report the layout of the written image', async () => {
      const input = await writeBytes('ab.txt', new TextEncoder().encode('AB'));
      const result = await fileToImage(input, path.join(dir, 'ab.png'));

      if (!result.ok) throw new Error(result.error.message);
      expect(result.value.payloadBytes).toBe(2);
      expect(result.value.layout).toEqual({
        frameLength: 10,
        minPixels: 4,
        width: 2,
        height: 2,
        capacity: 12,
        padding: 2,
      });
      const written = await fs.stat(result.value.outputPath);
      expect(result.value.imageBytes).toBe(written.size);
    });

    it('should round-trip an empty file', async () => {
      const input = await writeBytes('empty', new Uint8Array(0));
      const image = path.join(dir, 'empty.png');
      const restored = path.join(dir, 'empty.out');

      await fileToImage(input, image);
      const decoded = await imageToFile(image, restored);

      if (!decoded.ok) throw new Error(decoded.error.message);
      expect(decoded.value).toEqual({
        imagePath: image,
        outputPath: restored,
        width: 1,
        height: 3,
        payloadBytes: 0,
      });
      expect((await fs.readFile(restored)).length).toBe(0);
    });

    it('should keep trailing zero bytes', async () => {
      const payload = new Uint8Array([1, 2, 3, 0, 0, 0, 0]);
      const input = await writeBytes('zeros.bin', payload);
      const image = path.join(dir, 'zeros.png');
      const restored = path.join(dir, 'zeros.out');

      await fileToImage(input, image);
      await imageToFile(image, restored);

      expect(Array.from(await fs.readFile(restored))).toEqual([1, 2, 3, 0, 0, 0, 0]);
    });

    it('should create missing output directories', async () => {
      const input = await writeBytes('data.bin', randomPayload(10));
      const image = path.join(dir, 'nested', 'deeper', 'data.png');

      const result = await fileToImage(input, image);
      expect(result.ok).toBe(true);
      expect(await fileExists(image)).toBe(true);
    });
  });

  describe('failures', () => {
    it('should report SourceUnavailable for a missing input file', async () => {
      const missing = path.join(dir, 'missing.bin');
      const output = path.join(dir, 'out.png');
      const result = await fileToImage(missing, output);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('SourceUnavailable');
      expect(result.error.path).toBe(missing);
      expect(await fileExists(output)).toBe(false);
    });

    it('should report SourceUnavailable for a missing image', async () => {
      const result = await imageToFile(path.join(dir, 'missing.png'), path.join(dir, 'out'));
      expect(result.ok ? null : result.error.kind).toBe('SourceUnavailable');
    });

    it('should not overwrite an existing destination unless asked', async () => {
      const input = await writeBytes('data.bin', randomPayload(64));
      const image = await writeBytes('taken.png', new TextEncoder().encode('keep me'));

      const refused = await fileToImage(input, image);
      expect(refused.ok ? null : refused.error.kind).toBe('DestinationExists');
      expect(await fs.readFile(image, 'utf-8')).toBe('keep me');
      expect((await fs.readdir(dir)).sort()).toEqual(['data.bin', 'taken.png']);

      const forced = await fileToImage(input, image, { overwrite: true });
      expect(forced.ok).toBe(true);
      expect(await fs.readFile(image, 'utf-8')).not.toBe('keep me');
    });

    it('should leave no temporary files behind after replacing a destination', async () => {
      const input = await writeBytes('data.bin', randomPayload(64));
      const image = await writeBytes('data.png', new TextEncoder().encode('old'));

      const result = await fileToImage(input, image, { overwrite: true });

      expect(result.ok).toBe(true);
      expect((await fs.readdir(dir)).sort()).toEqual(['data.bin', 'data.png']);
    });

    it('should keep the destination intact when it cannot be replaced', async () => {
      const input = await writeBytes('data.bin', randomPayload(64));
      const blocked = path.join(dir, 'blocked.png');
      await fs.mkdir(blocked);
      await fs.writeFile(path.join(blocked, 'inside.txt'), 'still here');

      const result = await fileToImage(input, blocked, { overwrite: true });

      expect(result.ok ? null : result.error.kind).toBe('WriteFailed');
      expect(await fs.readFile(path.join(blocked, 'inside.txt'), 'utf-8')).toBe('still here');
      expect((await fs.readdir(dir)).sort()).toEqual(['blocked.png', 'data.bin']);
    });

    it('should report InvalidImage for a file that is not a PNG', async () => {
      const notImage = await writeBytes('notes.png', new TextEncoder().encode('plain text'));
      const output = path.join(dir, 'notes.out');
      const result = await imageToFile(notImage, output);

      expect(result.ok ? null : result.error.kind).toBe('InvalidImage');
      expect(await fileExists(output)).toBe(false);
    });

    it('should report TruncatedPayload when the header claims more than the image holds', async () => {
      const lying = new Uint8Array(12);
      lying[7] = 100;
      const image = await writeBytes('lying.png', await encodePng(packPixels(lying, 2, 2)));
      const output = path.join(dir, 'lying.out');

      const result = await imageToFile(image, output);
      expect(result.ok ? null : result.error.kind).toBe('TruncatedPayload');
      expect(await fileExists(output)).toBe(false);
    });

    it('should report TruncatedHeader for an image under eight bytes', async () => {
      const image = await writeBytes('tiny.png', await encodePng(packPixels(new Uint8Array(0), 1, 2)));
      const result = await imageToFile(image, path.join(dir, 'tiny.out'));
      expect(result.ok ? null : result.error.kind).toBe('TruncatedHeader');
    });
  });

  describe('inspectImage', () => {
    it('should describe an encoded image', async () => {
      const input = await writeBytes('ab.txt', new TextEncoder().encode('AB'));
      const image = path.join(dir, 'ab.png');
      await fileToImage(input, image);

      const result = await inspectImage(image);
      if (!result.ok) throw new Error(result.error.message);
      expect(result.value).toEqual({
        imagePath: image,
        width: 2,
        height: 2,
        capacity: 12,
        declaredLength: '2',
        status: 'ok',
        padding: 2,
      });
    });

    it('should flag a header that overruns the image', async () => {
      const image = await writeBytes(
        'over.png',
        await encodePng(packPixels(encodeFrame(new Uint8Array(0)).fill(0xff), 1, 3))
      );

      const result = await inspectImage(image);
      if (!result.ok) throw new Error(result.error.message);
      expect(result.value.status).toBe('truncated-payload');
      expect(result.value.declaredLength).toBe('18446744073709551615');
      expect(result.value.padding).toBeNull();
    });

    it('should flag an image too small for a header', async () => {
      const image = await writeBytes('tiny.png', await encodePng(packPixels(new Uint8Array(0), 2, 1)));

      const result = await inspectImage(image);
      if (!result.ok) throw new Error(result.error.message);
      expect(result.value.status).toBe('truncated-header');
      expect(result.value.declaredLength).toBeNull();
    });

    it('should pass through read failures', async () => {
      const result = await inspectImage(path.join(dir, 'nope.png'));
      expect(result.ok ? null : result.error.kind).toBe('SourceUnavailable');
    });
  });
});
