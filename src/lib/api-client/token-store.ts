export interface TokenStore {
    getAccessToken(): string | null;
    getRefreshToken(): string | null;
    setTokens(access: string, refresh: string): void;
    setAccessToken(access: string): void;
    clear(): void;
}

export class MemoryTokenStore implements TokenStore {
    private access: string | null = null;
    private refresh: string | null = null;

    getAccessToken() {
        return this.access;
    }

    getRefreshToken() {
        return this.refresh;
    }

    setTokens(access: string, refresh: string) {
        this.access = access;
        this.refresh = refresh;
    }

    setAccessToken(access: string) {
        this.access = access;
    }

    clear() {
        this.access = null;
        this.refresh = null;
    }
}

const ACCESS_KEY = 'law-office-access-token';
const REFRESH_KEY = 'law-office-refresh-token';

/** Browser store; survives reloads. Storage failures (private mode, quota) are logged and ignored. */
export class LocalStorageTokenStore implements TokenStore {
    constructor(private storage: Storage = window.localStorage) {}

    private read(key: string) {
        try {
            return this.storage.getItem(key);
        } catch (error) {
            console.warn('[api] Failed to read token storage:', error);
            return null;
        }
    }

    private write(key: string, value: string | null) {
        try {
            if (value === null) {
                this.storage.removeItem(key);
            } else {
                this.storage.setItem(key, value);
            }
        } catch (error) {
            console.warn('[api] Failed to persist token:', error);
        }
    }

    getAccessToken() {
        return this.read(ACCESS_KEY);
    }

    getRefreshToken() {
        return this.read(REFRESH_KEY);
    }

    setTokens(access: string, refresh: string) {
        this.write(ACCESS_KEY, access);
        this.write(REFRESH_KEY, refresh);
    }

    setAccessToken(access: string) {
        this.write(ACCESS_KEY, access);
    }

    clear() {
        this.write(ACCESS_KEY, null);
        this.write(REFRESH_KEY, null);
    }
}

/** LocalStorage in a browser, memory anywhere else (server render, tests). */
export function defaultTokenStore(): TokenStore {
    return typeof window !== 'undefined' && 'localStorage' in window
        ? new LocalStorageTokenStore(window.localStorage)
        : new MemoryTokenStore();
}
