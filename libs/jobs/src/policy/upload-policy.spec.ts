import {
  samplePdf,
  sampleExecutable,
  sampleJpeg,
} from '../../../../test/fixtures/sample-files';
import {
  UploadRejectedError,
  assertAcceptableUpload,
  checkUploadSize,
  isAllowedMediaType,
} from './upload-policy';

describe('upload policy', () => {
  it('accepts a PDF and reports the sniffed type', async () => {
    await expect(assertAcceptableUpload(samplePdf(), 1024 * 1024)).resolves.toBe(
      'application/pdf',
    );
  });

  it('accepts a JPEG', async () => {
    await expect(assertAcceptableUpload(sampleJpeg(), 1024 * 1024)).resolves.toBe(
      'image/jpeg',
    );
  });

  it('rejects an empty upload', async () => {
    await expect(assertAcceptableUpload(Buffer.alloc(0), 1024)).rejects.toMatchObject({
      reason: 'empty',
      message: 'Empty file uploaded',
    });
  });

  it('rejects an upload over the ceiling before sniffing it', async () => {
    await expect(assertAcceptableUpload(samplePdf(4096), 4095)).rejects.toMatchObject({
      reason: 'too_large',
      message: 'File size 4096 exceeds maximum allowed size of 4095 bytes',
    });
  });

  it('rejects executables whatever their name', async () => {
    const rejection = assertAcceptableUpload(sampleExecutable(), 1024);

    await expect(rejection).rejects.toBeInstanceOf(UploadRejectedError);
    await expect(rejection).rejects.toMatchObject({ reason: 'unsupported' });
  });

  it('rejects bytes it cannot identify', async () => {
    await expect(
      assertAcceptableUpload(Buffer.from('just some words', 'utf8'), 1024),
    ).rejects.toThrow(
      'Unsupported file type: unknown. Supported types: application/pdf, image/png, image/jpeg, image/webp, image/gif',
    );
  });

  it('checks sizes at the boundary', () => {
    expect(checkUploadSize(10, 10)).toBeNull();
    expect(checkUploadSize(11, 10)?.reason).toBe('too_large');
  });

  it('knows the allow-list', () => {
    expect(isAllowedMediaType('image/webp')).toBe(true);
    expect(isAllowedMediaType('image/tiff')).toBe(false);
  });
});
