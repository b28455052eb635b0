export type Millis = number; // unix epoch ms
export type IsoTimestamp = string; // ISO-8601, as written by Date#toISOString

export type ServerId = string;
export type UserId = string;
export type NetworkName = string;

export const DEFAULT_REASON = "No reason provided";

export function unknownUserName(userId: UserId): string {
    return `Unknown User (${userId})`;
}

/** ---------- Domain ---------- */
export interface Network {
    name: NetworkName;
    /** Server that created the network. Informational only. */
    ownerServerId: ServerId;
    /** Unique server ids, in join order. Never empty while the network exists. */
    members: ServerId[];
    createdAt: IsoTimestamp;
}

/** Registry state as loaded from storage; iteration order follows the document. */
export type RegistrySnapshot = ReadonlyMap<NetworkName, Network>;

export interface BanRecord {
    userId: UserId;
    /** Best-effort; falls back to unknownUserName() when the platform cannot resolve it. */
    userDisplayName: string;
    reason: string;
    initiatorServerId: ServerId;
    initiatorServerName: string;
    initiatorActorId: UserId;
    initiatorActorName: string;
    timestamp: IsoTimestamp;
    /** Networks the origin server belonged to when the ban was issued. */
    networks: NetworkName[];
}

/** ---------- Persisted documents ---------- */
export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

export const DOCUMENT_NAMES = ["networks", "ban-log"] as const;
export type DocumentName = (typeof DOCUMENT_NAMES)[number];

// Document shapes are type aliases so they stay assignable to JsonValue.
export type NetworkDocument = {
    owner: ServerId;
    servers: ServerId[];
    created_at: IsoTimestamp;
};

export type RegistryDocument = Record<NetworkName, NetworkDocument>;

export type BanRecordDocument = {
    user_id: UserId;
    user_name: string;
    reason: string;
    initiator_server: ServerId;
    initiator_server_name: string;
    initiator_user: UserId;
    initiator_user_name: string;
    timestamp: IsoTimestamp;
    networks: NetworkName[];
};

export type BanLogDocument = BanRecordDocument[];

export const EMPTY_DOCUMENTS: { [K in DocumentName]: JsonValue } = {
    networks: {},
    "ban-log": [],
};

/** ---------- Narrow runtime validators (no business rules) ---------- */
export class SchemaError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "SchemaError";
    }
}

export function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isNonEmptyString(s: unknown): s is string {
    return typeof s === "string" && s.trim().length > 0;
}

function isTimestamp(s: unknown): s is IsoTimestamp {
    return typeof s === "string" && Number.isFinite(Date.parse(s));
}

/**
 * Ids are strings on the wire. Documents written by older bots may carry them as
 * JSON numbers; those are accepted when they survive the round trip exactly.
 */
function readId(v: unknown, where: string): string {
    if (isNonEmptyString(v)) return v;
    if (typeof v === "number" && Number.isSafeInteger(v)) return String(v);
    throw new SchemaError(`${where} must be a non-empty string id`);
}

function readString(v: unknown, where: string): string {
    if (typeof v !== "string") throw new SchemaError(`${where} must be a string`);
    return v;
}

export function parseRegistryDocument(doc: unknown): Map<NetworkName, Network> {
    if (!isRecord(doc)) throw new SchemaError("networks document must be an object");
    const out = new Map<NetworkName, Network>();
    for (const [name, raw] of Object.entries(doc)) {
        const where = `networks["${name}"]`;
        if (!isRecord(raw)) throw new SchemaError(`${where} must be an object`);
        if (!Array.isArray(raw.servers) || raw.servers.length === 0) {
            throw new SchemaError(`${where}.servers must be a non-empty array`);
        }
        const members = raw.servers.map((s, i) => readId(s, `${where}.servers[${i}]`));
        if (new Set(members).size !== members.length) {
            throw new SchemaError(`${where}.servers must not contain duplicates`);
        }
        if (!isTimestamp(raw.created_at)) throw new SchemaError(`${where}.created_at must be an ISO-8601 timestamp`);
        out.set(name, {
            name,
            ownerServerId: readId(raw.owner, `${where}.owner`),
            members,
            createdAt: raw.created_at,
        });
    }
    return out;
}

export function toRegistryDocument(registry: RegistrySnapshot): RegistryDocument {
    // fromEntries defines own keys, so a network called "__proto__" stays a key.
    return Object.fromEntries(
        [...registry].map(([name, n]): [NetworkName, NetworkDocument] => [
            name,
            { owner: n.ownerServerId, servers: [...n.members], created_at: n.createdAt },
        ]),
    );
}

export function parseBanLogDocument(doc: unknown): BanRecord[] {
    if (!Array.isArray(doc)) throw new SchemaError("ban log document must be an array");
    return doc.map((raw: unknown, i): BanRecord => {
        const where = `banLog[${i}]`;
        if (!isRecord(raw)) throw new SchemaError(`${where} must be an object`);
        if (!isTimestamp(raw.timestamp)) throw new SchemaError(`${where}.timestamp must be an ISO-8601 timestamp`);
        if (!Array.isArray(raw.networks)) throw new SchemaError(`${where}.networks must be an array`);
        return {
            userId: readId(raw.user_id, `${where}.user_id`),
            userDisplayName: readString(raw.user_name, `${where}.user_name`),
            reason: readString(raw.reason, `${where}.reason`),
            initiatorServerId: readId(raw.initiator_server, `${where}.initiator_server`),
            initiatorServerName: readString(raw.initiator_server_name, `${where}.initiator_server_name`),
            initiatorActorId: readId(raw.initiator_user, `${where}.initiator_user`),
            initiatorActorName: readString(raw.initiator_user_name, `${where}.initiator_user_name`),
            timestamp: raw.timestamp,
            networks: raw.networks.map((n, j) => readString(n, `${where}.networks[${j}]`)),
        };
    });
}

export function toBanRecordDocument(r: BanRecord): BanRecordDocument {
    return {
        user_id: r.userId,
        user_name: r.userDisplayName,
        reason: r.reason,
        initiator_server: r.initiatorServerId,
        initiator_server_name: r.initiatorServerName,
        initiator_user: r.initiatorActorId,
        initiator_user_name: r.initiatorActorName,
        timestamp: r.timestamp,
        networks: [...r.networks],
    };
}

/** ---------- Input normalization ---------- */

/** Trims surrounding whitespace; returns undefined for blank input. Names stay case-sensitive. */
export function normalizeNetworkName(name: unknown): NetworkName | undefined {
    if (typeof name !== "string") return undefined;
    const trimmed = name.trim();
    return trimmed.length > 0 ? trimmed : undefined;
}

export function normalizeReason(reason: unknown): string {
    if (typeof reason !== "string") return DEFAULT_REASON;
    const trimmed = reason.trim();
    return trimmed.length > 0 ? trimmed : DEFAULT_REASON;
}
