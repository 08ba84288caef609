import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { ProjectProfile } from '../../types/index.js';
import { errorMessage } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';

const profileSchema = z.object({
    name: z.string().default(''),
    techStack: z.array(z.string().min(1)).default([]),
    projectStructure: z.array(z.string().min(1)).default([]),
    plans: z.array(z.string().min(1)).default([])
});

export const EMPTY_PROFILE: ProjectProfile = Object.freeze({
    name: '',
    techStack: [],
    projectStructure: [],
    plans: []
});

export function parseProjectProfile(raw: unknown): ProjectProfile {
    return profileSchema.parse(raw);
}

/**
 * Load the project profile once at startup. A missing file is an empty profile;
 * a file that exists but does not parse is logged and also treated as empty.
 */
export async function loadProjectProfile(path: string): Promise<ProjectProfile> {
    if (!path) return EMPTY_PROFILE;

    let text: string;
    try {
        text = await readFile(path, 'utf-8');
    } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
            logger.info(`[ProjectProfile] No profile at ${path}, starting with an empty profile`);
        } else {
            logger.warn(`[ProjectProfile] Could not read ${path}: ${errorMessage(err)}`);
        }
        return EMPTY_PROFILE;
    }

    try {
        const profile = parseProjectProfile(JSON.parse(text));
        logger.info(`[ProjectProfile] Loaded "${profile.name}" (${profile.techStack.length} technologies, ${profile.projectStructure.length} structure notes)`);
        return profile;
    } catch (err) {
        logger.warn(`[ProjectProfile] Ignoring invalid profile ${path}: ${errorMessage(err)}`);
        return EMPTY_PROFILE;
    }
}
