import { S3Client, S3ServiceException, type ServiceOutputTypes } from '@aws-sdk/client-s3';
import { describe, expect, it } from 'vitest';
import {
  ArtifactNotFoundError,
  PermanentExternalError,
  TransientExternalError,
} from '../src/lib/errors.js';
import {
  S3ArtifactStore,
  classifyHeadError,
  classifyS3Error,
  sha256Hex,
} from '../src/lib/objectStore.js';
import { MemoryArtifactStore } from '../src/testing/memoryArtifactStore.js';

function s3Error(name: string, fault: 'client' | 'server', httpStatusCode: number) {
  return new S3ServiceException({
    name,
    $fault: fault,
    $metadata: { httpStatusCode },
    message: `${name} happened`,
  });
}

describe('classifyS3Error', () => {
  const key = 'accessions/a1/archive.wacz';

  it('maps a missing object to ArtifactNotFoundError', () => {
    const error = classifyS3Error(s3Error('NoSuchKey', 'client', 404), key);
    expect(error).toBeInstanceOf(ArtifactNotFoundError);
    expect(error.message).toBe(`Artifact not found: ${key}`);
  });

  it('treats throttling and server faults as transient', () => {
    expect(classifyS3Error(s3Error('SlowDown', 'client', 503), key)).toBeInstanceOf(
      TransientExternalError
    );
    expect(classifyS3Error(s3Error('InternalError', 'server', 500), key)).toBeInstanceOf(
      TransientExternalError
    );
  });

  it('treats access errors as permanent', () => {
    const error = classifyS3Error(s3Error('AccessDenied', 'client', 403), key);
    expect(error).toBeInstanceOf(PermanentExternalError);
    expect(error.message).toBe('object-store: AccessDenied: AccessDenied happened');
  });

  it('treats non-SDK failures as transient', () => {
    const error = classifyS3Error(new Error('socket hang up'), key);
    expect(error).toBeInstanceOf(TransientExternalError);
    expect(error.message).toBe('object-store: socket hang up');
  });
});

describe('classifyHeadError', () => {
  const key = 'accessions/a1/archive.wacz';

  it('reads a 403 on HeadObject as a missing object', () => {
    expect(classifyHeadError(s3Error('Forbidden', 'client', 403), key)).toBeInstanceOf(
      ArtifactNotFoundError
    );
  });

  it('classifies everything else like any other call', () => {
    expect(classifyHeadError(s3Error('NotFound', 'client', 404), key)).toBeInstanceOf(
      ArtifactNotFoundError
    );
    expect(classifyHeadError(s3Error('InternalError', 'server', 500), key)).toBeInstanceOf(
      TransientExternalError
    );
  });
});

/**
 * S3 client whose requests stop at the first middleware step and never leave the process
 */
function stubbedClient(respond: (commandName: string) => ServiceOutputTypes) {
  const commands: string[] = [];
  const client = new S3Client({
    region: 'us-east-1',
    credentials: { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' },
  });
  client.middlewareStack.add(
    (_next, context) => async () => {
      const commandName = context.commandName ?? 'unknown';
      commands.push(commandName);
      return { output: respond(commandName), response: {} };
    },
    { step: 'initialize', name: 'stubTransport' }
  );
  return { client, commands };
}

describe('S3ArtifactStore', () => {
  const key = 'accessions/a1/archive.wacz';
  const bytes = Buffer.from('PK archive');

  it('uploads when HeadObject is forbidden for a missing key', async () => {
    const { client, commands } = stubbedClient((commandName) => {
      if (commandName === 'HeadObjectCommand') {
        throw s3Error('Forbidden', 'client', 403);
      }
      return { $metadata: {} };
    });

    const reference = await new S3ArtifactStore(client, 'test-archives').put(key, bytes);

    expect(reference).toBe(key);
    expect(commands).toEqual(['HeadObjectCommand', 'PutObjectCommand']);
  });

  it('skips the upload when the stored digest matches', async () => {
    const { client, commands } = stubbedClient(() => ({
      $metadata: {},
      Metadata: { sha256: sha256Hex(bytes) },
    }));

    expect(await new S3ArtifactStore(client, 'test-archives').put(key, bytes)).toBe(key);
    expect(commands).toEqual(['HeadObjectCommand']);
  });

  it('still fails the upload itself on a 403', async () => {
    const { client } = stubbedClient(() => {
      throw s3Error('AccessDenied', 'client', 403);
    });

    await expect(
      new S3ArtifactStore(client, 'test-archives').put(key, bytes)
    ).rejects.toBeInstanceOf(PermanentExternalError);
  });

  it('signs no link for an object HeadObject cannot see', async () => {
    const { client } = stubbedClient(() => {
      throw s3Error('Forbidden', 'client', 403);
    });

    await expect(
      new S3ArtifactStore(client, 'test-archives').getDownloadUrl(key, 60)
    ).rejects.toBeInstanceOf(ArtifactNotFoundError);
  });
});

describe('sha256Hex', () => {
  it('hashes bytes as lowercase hex', () => {
    expect(sha256Hex(Buffer.from('abc'))).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
    );
  });
});

describe('MemoryArtifactStore', () => {
  it('keeps one object per key when the same upload repeats', async () => {
    const store = new MemoryArtifactStore();
    const bytes = Buffer.from('PK archive');

    const first = await store.put('accessions/a1/archive.wacz', bytes);
    const second = await store.put('accessions/a1/archive.wacz', bytes);

    expect(second).toBe(first);
    expect(store.objects.size).toBe(1);
  });

  it('streams stored bytes back', async () => {
    const store = new MemoryArtifactStore();
    await store.put('accessions/a1/archive.wacz', Buffer.from('PK archive'));

    const chunks: Buffer[] = [];
    for await (const chunk of await store.get('accessions/a1/archive.wacz')) {
      chunks.push(Buffer.from(chunk));
    }
    expect(Buffer.concat(chunks).toString()).toBe('PK archive');
  });

  it('signs download links only for stored references', async () => {
    const store = new MemoryArtifactStore((key) => `s3://test-archives/${key}`);
    const reference = await store.put('accessions/a1/archive.wacz', Buffer.from('PK'));

    expect(reference).toBe('s3://test-archives/accessions/a1/archive.wacz');
    expect(await store.getDownloadUrl(reference, 60)).toBe(
      'memory://accessions/a1/archive.wacz?expires=60'
    );
    await expect(store.getDownloadUrl('s3://test-archives/other', 60)).rejects.toBeInstanceOf(
      ArtifactNotFoundError
    );
  });
});
