/**
 * Tiny structured logger with namespaces.
 *
 * Env:
 *  - LOG_ENABLED=0            -> disable logs (default: enabled)
 *  - LOG_LEVEL=debug|info|... -> min level (default: info)
 *  - LOG_JSON=1               -> JSON lines (default: pretty text)
 *  - LOG_SERVICE_NAME=san     -> service tag (optional)
 *
 * Meta keys containing "password" are masked before anything is written,
 * so CHAP secrets from initiator payloads can be logged as-is.
 */

type LevelName = "trace" | "debug" | "info" | "warn" | "error";

type LevelMap = Record<LevelName, number>;

export interface LogMeta {
    [key: string]: unknown;
    error?: unknown;
    err?: unknown;
}

export interface Logger {
    trace(message: unknown, meta?: LogMeta): void;
    debug(message: unknown, meta?: LogMeta): void;
    info(message: unknown, meta?: LogMeta): void;
    warn(message: unknown, meta?: LogMeta): void;
    error(message: unknown, meta?: LogMeta): void;
    child(namespace: string | string[]): Logger;
}

const LEVELS: LevelMap = {
    trace: 10,
    debug: 20,
    info: 30,
    warn: 40,
    error: 50,
};

const MASK = "***";
const SECRET_KEY = /password/i;

function isLevelName(value: string): value is LevelName {
    return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function resolveMinLevel(raw: string | undefined): number {
    const name = (raw || "info").toLowerCase();
    return isLevelName(name) ? LEVELS[name] : LEVELS.info;
}

const ENABLED = process.env.LOG_ENABLED !== "0";
const MIN_LEVEL = resolveMinLevel(process.env.LOG_LEVEL);
const AS_JSON = process.env.LOG_JSON === "1";
const SERVICE = process.env.LOG_SERVICE_NAME || "";

function levelName(value: number): LevelName {
    const entry = Object.entries(LEVELS).find(([, v]) => v === value);
    return entry && isLevelName(entry[0]) ? entry[0] : "info";
}

type Scalar = string | number | boolean | null | undefined;

function isScalar(value: unknown): value is Scalar {
    return value === null || (typeof value !== "object" && typeof value !== "function");
}

/**
 * Errors keep their scalar fields only. Library errors (HTTP clients above all)
 * hang request configs, sockets and headers off themselves.
 */
function serializeError(err: unknown): unknown {
    if (!err) return undefined;
    if (err instanceof Error) {
        const extra: Record<string, unknown> = {};
        for (const [key, val] of Object.entries(err)) {
            if (key === "message" || key === "name" || key === "stack" || key === "cause") continue;
            if (isScalar(val)) extra[key] = val;
            else if (Array.isArray(val) && val.every(isScalar)) extra[key] = [...val];
        }
        return {
            message: err.message,
            stack: err.stack,
            name: err.name,
            ...extra,
            ...(err.cause instanceof Error ? { cause: serializeError(err.cause) } : {}),
        };
    }
    return err;
}

/**
 * Deep copy of `value` with every `*password*` key masked.
 */
export function redact(value: unknown, seen: WeakSet<object> = new WeakSet()): unknown {
    if (Array.isArray(value)) {
        if (seen.has(value)) return "[circular]";
        seen.add(value);
        return value.map((item) => redact(item, seen));
    }
    if (value instanceof Error) {
        return redact(serializeError(value), seen);
    }
    if (value && typeof value === "object") {
        if (seen.has(value)) return "[circular]";
        seen.add(value);
        const out: Record<string, unknown> = {};
        for (const [key, val] of Object.entries(value)) {
            out[key] = SECRET_KEY.test(key) && val !== undefined && val !== null ? MASK : redact(val, seen);
        }
        return out;
    }
    return value;
}

function safeStringify(obj: unknown): string {
    try {
        return JSON.stringify(obj);
    } catch {
        return '{"_":"[unserializable]"}';
    }
}

function joinNamespace(ns?: string | string[]): string {
    if (!ns) return "";
    if (Array.isArray(ns)) return ns.join(":");
    return String(ns);
}

function baseLog({ ns }: { ns?: string | string[] }): Logger {
    const namespace = joinNamespace(ns);

    const write = (levelValue: number, msg: unknown, meta?: LogMeta) => {
        if (!ENABLED || levelValue < MIN_LEVEL) return;

        const now = new Date();
        const lvl = levelName(levelValue);
        const safeMeta = meta ? redact(meta) : undefined;
        const payload = {
            ts: now.toISOString(),
            level: lvl,
            ns: namespace || undefined,
            service: SERVICE || undefined,
            pid: process.pid,
            msg: String(msg ?? ""),
            ...(safeMeta ? { meta: safeMeta } : {}),
        };

        let line: string;
        if (AS_JSON) {
            line = safeStringify(payload);
        } else {
            const tags = [
                `[${payload.ts}]`,
                SERVICE && `[${SERVICE}]`,
                `[${lvl.toUpperCase()}]`,
                namespace && `[${namespace}]`,
            ]
                .filter(Boolean)
                .join(" ");

            const tail = safeMeta ? ` ${safeStringify(safeMeta)}` : "";
            line = `${tags} ${payload.msg}${tail}`;
        }

        if (levelValue >= LEVELS.error) {
            console.error(line);
        } else if (levelValue >= LEVELS.warn) {
            console.warn(line);
        } else {
            console.log(line);
        }
    };

    const child = (subNs: string | string[]): Logger => {
        const next = Array.isArray(subNs) ? subNs : [String(subNs)];
        const merged = namespace ? [namespace, ...next] : next;
        return baseLog({ ns: merged });
    };

    return {
        trace: (m, meta) => write(LEVELS.trace, m, meta),
        debug: (m, meta) => write(LEVELS.debug, m, meta),
        info: (m, meta) => write(LEVELS.info, m, meta),
        warn: (m, meta) => write(LEVELS.warn, m, meta),
        error: (m, meta) => write(LEVELS.error, m, meta),
        child,
    };
}

const logger = baseLog({ ns: "" });

export default logger;
