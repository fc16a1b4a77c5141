import { describe, it, expect } from 'vitest';
import { ScannerError, ScannerErrorKind } from '../errors.js';
import { scanRepository } from '../resolver/repository-scanner.js';
import {
  FakeDockerImageLister,
  HOST,
  PROJECT,
  createLogger,
  digest,
  dockerImage,
  imageUri,
  repoName,
} from './fixtures.js';

const REPO = repoName('repo-one');

describe('scanRepository', () => {
  it('returns one target per image name', async () => {
    const lister = new FakeDockerImageLister({
      [REPO]: [
        dockerImage(imageUri('repo-one', 'app', digest('a')), {
          tags: ['v2'],
          updateTime: '2024-03-01T00:00:00Z',
        }),
        dockerImage(imageUri('repo-one', 'app', digest('b')), {
          tags: ['latest'],
          updateTime: '2024-02-01T00:00:00Z',
        }),
        dockerImage(imageUri('repo-one', 'worker', digest('c')), {
          updateTime: '2024-01-01T00:00:00Z',
        }),
      ],
    });

    const targets = await scanRepository(lister, REPO, { logger: createLogger() });

    expect(targets.map((t) => [t.artifact.imageName, t.artifact.digest])).toEqual([
      ['app', digest('b')],
      ['worker', digest('c')],
    ]);
    expect(targets[0]).toMatchObject({
      uri: imageUri('repo-one', 'app', digest('b')),
      location: 'us-central1',
      repository: 'repo-one',
    });
  });

  it('requests images most recently updated first', async () => {
    const lister = new FakeDockerImageLister({ [REPO]: [] });

    await scanRepository(lister, REPO, { logger: createLogger() });

    expect(lister.calls).toEqual([{ repositoryName: REPO, orderBy: 'update_time desc' }]);
  });

  it('returns nothing for an empty repository', async () => {
    const lister = new FakeDockerImageLister({ [REPO]: [] });

    await expect(scanRepository(lister, REPO, { logger: createLogger() })).resolves.toEqual([]);
  });

  it('considers only the first candidates per image', async () => {
    const hexChars = ['1', '2', '3', '4', '5', '6', '7'];
    const images = hexChars.map((ch, i) =>
      dockerImage(imageUri('repo-one', 'app', digest(ch)), {
        // index 5 is the only one tagged latest
        tags: i === 5 ? ['latest'] : [],
        updateTime: new Date(Date.UTC(2024, 0, 30 - i)).toISOString(),
      })
    );
    const lister = new FakeDockerImageLister({ [REPO]: images });

    const capped = await scanRepository(lister, REPO, { logger: createLogger() });
    expect(capped.map((t) => t.artifact.digest)).toEqual([digest('1')]);

    const widened = await scanRepository(lister, REPO, {
      maxCandidatesPerImage: 6,
      logger: createLogger(),
    });
    expect(widened.map((t) => t.artifact.digest)).toEqual([digest('6')]);
  });

  it('skips entries without a digest', async () => {
    const logger = createLogger();
    const undigested = `${HOST}/${PROJECT}/repo-one/app:v1`;
    const lister = new FakeDockerImageLister({
      [REPO]: [
        dockerImage(undigested, { tags: ['latest'] }),
        dockerImage(imageUri('repo-one', 'app', digest('a')), { updateTime: '2024-01-01T00:00:00Z' }),
      ],
    });

    const targets = await scanRepository(lister, REPO, { logger });

    expect(targets.map((t) => t.artifact.digest)).toEqual([digest('a')]);
    expect(logger.warn).toHaveBeenCalledWith('Skipping image without digest', { uri: undigested });
  });

  it('treats missing update times as the epoch', async () => {
    const lister = new FakeDockerImageLister({
      [REPO]: [
        dockerImage(imageUri('repo-one', 'app', digest('a'))),
        dockerImage(imageUri('repo-one', 'app', digest('b')), { updateTime: 'not a time' }),
        dockerImage(imageUri('repo-one', 'app', digest('c')), { updateTime: '1999-12-31T00:00:00Z' }),
      ],
    });

    const targets = await scanRepository(lister, REPO, { logger: createLogger() });

    expect(targets.map((t) => t.artifact.digest)).toEqual([digest('c')]);
  });

  it('fails the repository on a malformed listed URI', async () => {
    const lister = new FakeDockerImageLister({
      [REPO]: [dockerImage('gcr.io/p/app@sha256:abc')],
    });

    const error = await scanRepository(lister, REPO, { logger: createLogger() }).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(ScannerError);
    expect(error).toMatchObject({
      kind: ScannerErrorKind.ListingFailed,
      message: `Failed to list images in ${REPO}: Invalid image reference gcr.io/p/app@sha256:abc: unrecognized format`,
    });
  });

  it('wraps listing failures', async () => {
    const lister = new FakeDockerImageLister({
      [REPO]: [dockerImage(imageUri('repo-one', 'app', digest('a'))), new Error('boom')],
    });

    await expect(scanRepository(lister, REPO, { logger: createLogger() })).rejects.toMatchObject({
      kind: ScannerErrorKind.ListingFailed,
      message: `Failed to list images in ${REPO}: boom`,
    });
  });

  it('passes cancellation through unwrapped', async () => {
    const lister = new FakeDockerImageLister({ [REPO]: [ScannerError.cancelled('Request cancelled')] });

    await expect(scanRepository(lister, REPO, { logger: createLogger() })).rejects.toMatchObject({
      kind: ScannerErrorKind.Cancelled,
      message: 'Request cancelled',
    });
  });
});
