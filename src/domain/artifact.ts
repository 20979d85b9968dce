/**
 * Artifact domain model.
 *
 * Artifacts are the unit of everything in the world: data, executable code,
 * contracts and agent identities. Control is expressed through metadata
 * (`authorized_writer`), never through the immutable `createdBy`.
 */

/** JSON-compatible value. Metadata, invocation arguments and results use it. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type ArtifactMetadata = Record<string, JsonValue>;

/** Metadata keys the kernel itself reads or maintains. */
export const META_AUTHORIZED_WRITER = 'authorized_writer';
export const META_AUTHORIZED_PRINCIPAL = 'authorized_principal';
export const META_PREVIOUS_WRITER = 'previous_writer';
export const META_CHARGE_TO = 'charge_to';

/** Artifact types with kernel-level meaning. */
export const ARTIFACT_TYPE_CONTRACT = 'contract';
export const ARTIFACT_TYPE_AGENT = 'agent';
export const ARTIFACT_TYPE_DELEGATION = 'delegation';

/** Discoverability description of an executable artifact's methods. */
export interface ArtifactInterface {
  description?: string;
  methods: Array<{ name: string; description?: string; args?: JsonObject; cost?: number }>;
}

export interface Artifact {
  id: string;
  type: string;
  content: string;
  code?: string;
  executable: boolean;
  /** Immutable creator. Informational only. */
  createdBy: string;
  accessContractId: string;
  metadata: ArtifactMetadata;
  /** Scrip charged per invocation. */
  price: number;
  /** Scrip charged per read. */
  readPrice: number;
  hasStanding: boolean;
  kernelProtected: boolean;
  deleted: boolean;
  deletedAt?: string;
  deletedBy?: string;
  createdAt: string;
  updatedAt: string;
  interface?: ArtifactInterface;
}

/** Listing entry returned by discovery queries. Content is omitted. */
export interface ArtifactSummary {
  id: string;
  type: string;
  createdBy: string;
  controller: string | null;
  accessContractId: string;
  executable: boolean;
  price: number;
  readPrice: number;
  hasStanding: boolean;
  sizeBytes: number;
  updatedAt: string;
  interface?: ArtifactInterface;
}

/** Bytes counted against the disk quota. */
export function artifactSize(artifact: Pick<Artifact, 'content' | 'code'>): number {
  return Buffer.byteLength(artifact.content, 'utf8') + Buffer.byteLength(artifact.code ?? '', 'utf8');
}

/** Current controller, or null for untagged artifacts. */
export function artifactController(artifact: Artifact): string | null {
  const writer = artifact.metadata[META_AUTHORIZED_WRITER];
  return typeof writer === 'string' && writer.length > 0 ? writer : null;
}

/** Metadata string value, or undefined when absent or not a string. */
export function metadataString(metadata: ArtifactMetadata, key: string): string | undefined {
  const value = metadata[key];
  return typeof value === 'string' ? value : undefined;
}

export function toArtifactSummary(artifact: Artifact): ArtifactSummary {
  const summary: ArtifactSummary = {
    id: artifact.id,
    type: artifact.type,
    createdBy: artifact.createdBy,
    controller: artifactController(artifact),
    accessContractId: artifact.accessContractId,
    executable: artifact.executable,
    price: artifact.price,
    readPrice: artifact.readPrice,
    hasStanding: artifact.hasStanding,
    sizeBytes: artifactSize(artifact),
    updatedAt: artifact.updatedAt,
  };
  if (artifact.interface) summary.interface = artifact.interface;
  return summary;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isJsonObject(value: unknown): value is JsonObject {
  return isRecord(value) && Object.values(value).every(isJsonValue);
}

/** Validate that an unknown value is JSON-compatible. */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/** Plain-data copy of a typed value for JSON payloads. */
export function toJsonValue(value: unknown): JsonValue {
  if (value === undefined) return null;
  const parsed: unknown = JSON.parse(JSON.stringify(value));
  return isJsonValue(parsed) ? parsed : null;
}

export function toJsonObject(value: unknown): JsonObject {
  const converted = toJsonValue(value);
  return isJsonObject(converted) ? converted : {};
}

/** Wire form of a full artifact, as returned by reads. */
export function toArtifactView(artifact: Artifact): JsonObject {
  const view: JsonObject = {
    id: artifact.id,
    type: artifact.type,
    content: artifact.content,
    executable: artifact.executable,
    created_by: artifact.createdBy,
    access_contract_id: artifact.accessContractId,
    metadata: artifact.metadata,
    price: artifact.price,
    read_price: artifact.readPrice,
    has_standing: artifact.hasStanding,
    created_at: artifact.createdAt,
    updated_at: artifact.updatedAt,
  };
  if (artifact.code !== undefined) view.code = artifact.code;
  if (artifact.interface) view.interface = toJsonValue(artifact.interface);
  return view;
}
