import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { EMPTY_PROFILE, loadProjectProfile, parseProjectProfile } from '../../src/services/profile/project-profile.js';

describe('project profile', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ctxi-profile-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('missing fields default to empty', () => {
    expect(parseProjectProfile({ name: 'shop' })).toEqual({ name: 'shop', techStack: [], projectStructure: [], plans: [] });
  });

  test('loads a profile file', async () => {
    const path = join(dir, 'profile.json');
    await writeFile(path, JSON.stringify({ name: 'shop', techStack: ['TypeScript', 'PostgreSQL'], projectStructure: ['src/api'] }));
    await expect(loadProjectProfile(path)).resolves.toEqual({
      name: 'shop',
      techStack: ['TypeScript', 'PostgreSQL'],
      projectStructure: ['src/api'],
      plans: []
    });
  });

  test('a missing file is an empty profile', async () => {
    await expect(loadProjectProfile(join(dir, 'absent.json'))).resolves.toBe(EMPTY_PROFILE);
    await expect(loadProjectProfile('')).resolves.toBe(EMPTY_PROFILE);
  });

  test('an unparseable file is an empty profile', async () => {
    const broken = join(dir, 'broken.json');
    await writeFile(broken, '{ not json');
    await expect(loadProjectProfile(broken)).resolves.toBe(EMPTY_PROFILE);

    const wrongShape = join(dir, 'wrong.json');
    await writeFile(wrongShape, JSON.stringify({ techStack: 'TypeScript' }));
    await expect(loadProjectProfile(wrongShape)).resolves.toBe(EMPTY_PROFILE);
  });
});
