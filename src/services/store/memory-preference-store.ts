import type { UserPreference } from '../../types/index.js';
import type { PreferenceStore } from './types.js';

export class InMemoryPreferenceStore implements PreferenceStore {
    private readonly byUser = new Map<string, Map<string, UserPreference>>();

    constructor(private readonly clock: () => Date = () => new Date()) { }

    async list(userId: string): Promise<UserPreference[]> {
        const prefs = this.byUser.get(userId);
        if (!prefs) return [];
        return [...prefs.values()].sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
    }

    async set(userId: string, key: string, value: string): Promise<UserPreference> {
        let prefs = this.byUser.get(userId);
        if (!prefs) {
            prefs = new Map();
            this.byUser.set(userId, prefs);
        }
        const pref: UserPreference = { user_id: userId, key, value, updated_at: this.clock() };
        prefs.set(key, pref);
        return pref;
    }

    async remove(userId: string, key: string): Promise<boolean> {
        return this.byUser.get(userId)?.delete(key) ?? false;
    }
}
