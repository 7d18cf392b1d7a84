import path from 'path';

export type ServerConfig = {
    jwtSecret: string;
    usingDefaultSecret: boolean;
    accessTokenLifetimeMinutes: number;
    refreshTokenLifetimeDays: number;
    databaseDir: string;
    uploadDir: string;
    maxUploadBytes: number;
    pageSize: number;
    maxPageSize: number;
};

export type ClientConfig = {
    apiBaseUrl: string;
    timeoutMs: number;
};

const DEFAULT_JWT_SECRET = 'secret_key_change_me';

function trimOrNull(value: string | undefined | null) {
    const trimmed = value?.trim();
    return trimmed && trimmed.length > 0 ? trimmed : null;
}

function parsePositiveInt(value: string | undefined | null, fallback: number) {
    const normalized = trimOrNull(value);
    if (!normalized) return fallback;
    const parsed = Number.parseInt(normalized, 10);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function parseServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
    const secret = trimOrNull(env.JWT_SECRET);
    return {
        jwtSecret: secret ?? DEFAULT_JWT_SECRET,
        usingDefaultSecret: secret === null,
        accessTokenLifetimeMinutes: parsePositiveInt(env.ACCESS_TOKEN_LIFETIME_MINUTES, 30),
        refreshTokenLifetimeDays: parsePositiveInt(env.REFRESH_TOKEN_LIFETIME_DAYS, 7),
        databaseDir: path.resolve(process.cwd(), trimOrNull(env.DATABASE_DIR) ?? './data'),
        uploadDir: path.resolve(process.cwd(), trimOrNull(env.UPLOAD_DIR) ?? './uploads'),
        maxUploadBytes: parsePositiveInt(env.MAX_UPLOAD_MB, 10) * 1024 * 1024,
        pageSize: parsePositiveInt(env.PAGE_SIZE, 20),
        maxPageSize: parsePositiveInt(env.MAX_PAGE_SIZE, 100),
    };
}

let serverConfig: ServerConfig | null = null;

export function getServerConfig(): ServerConfig {
    if (!serverConfig) {
        serverConfig = parseServerConfig();
        if (serverConfig.usingDefaultSecret && process.env.NODE_ENV === 'production') {
            console.warn('[config] JWT_SECRET is not set; tokens are signed with the development default.');
        }
    }
    return serverConfig;
}

// Tests swap settings (upload dir, lifetimes) without touching process.env.
export function setServerConfig(overrides: Partial<ServerConfig> | null) {
    serverConfig = overrides ? { ...parseServerConfig(), ...overrides } : null;
}

// NEXT_PUBLIC_* values are inlined at build time, so they are read by name here.
export function getClientConfig(): ClientConfig {
    return {
        apiBaseUrl: trimOrNull(process.env.NEXT_PUBLIC_API_BASE_URL) ?? '/api',
        timeoutMs: parsePositiveInt(process.env.NEXT_PUBLIC_API_TIMEOUT_MS, 30000),
    };
}
