/**
 * Action intents.
 *
 * An intent is the only thing a principal can submit to the kernel. The wire
 * form is snake_case JSON tagged by `action_type`; `parseIntent` validates it
 * into the camelCase union the executor dispatches on.
 */

import {
  ArtifactInterface,
  ArtifactMetadata,
  JsonValue,
  isJsonObject,
  isJsonValue,
  isRecord,
} from './artifact';
import { KernelError, Result, err, ok, validationError } from './errors';

export type ActionType =
  | 'noop'
  | 'read_artifact'
  | 'write_artifact'
  | 'edit_artifact'
  | 'invoke_artifact'
  | 'delete_artifact'
  | 'transfer'
  | 'mint'
  | 'cancel_mint'
  | 'subscribe_artifact'
  | 'unsubscribe_artifact'
  | 'configure_context'
  | 'submit_to_task'
  | 'update_metadata'
  | 'query_kernel';

export const ACTION_TYPES: readonly ActionType[] = [
  'noop',
  'read_artifact',
  'write_artifact',
  'edit_artifact',
  'invoke_artifact',
  'delete_artifact',
  'transfer',
  'mint',
  'cancel_mint',
  'subscribe_artifact',
  'unsubscribe_artifact',
  'configure_context',
  'submit_to_task',
  'update_metadata',
  'query_kernel',
];

interface IntentBase {
  principalId: string;
}

export interface NoopIntent extends IntentBase {
  actionType: 'noop';
}

export interface ReadArtifactIntent extends IntentBase {
  actionType: 'read_artifact';
  artifactId: string;
}

export interface WriteArtifactIntent extends IntentBase {
  actionType: 'write_artifact';
  artifactId: string;
  artifactType: string;
  content: string;
  code?: string;
  executable: boolean;
  price: number;
  readPrice: number;
  /** Required when creating; optional on update. */
  accessContractId?: string;
  metadata?: ArtifactMetadata;
  hasStanding: boolean;
  interface?: ArtifactInterface;
}

export interface EditArtifactIntent extends IntentBase {
  actionType: 'edit_artifact';
  artifactId: string;
  oldString: string;
  newString: string;
}

export interface InvokeArtifactIntent extends IntentBase {
  actionType: 'invoke_artifact';
  artifactId: string;
  method: string;
  args: JsonValue[];
}

export interface DeleteArtifactIntent extends IntentBase {
  actionType: 'delete_artifact';
  artifactId: string;
}

export interface TransferIntent extends IntentBase {
  actionType: 'transfer';
  recipientId: string;
  amount: number;
  memo?: string;
}

export interface MintIntent extends IntentBase {
  actionType: 'mint';
  artifactId: string;
  bid: number;
}

export interface CancelMintIntent extends IntentBase {
  actionType: 'cancel_mint';
  submissionId: string;
}

export interface SubscribeArtifactIntent extends IntentBase {
  actionType: 'subscribe_artifact';
  artifactId: string;
}

export interface UnsubscribeArtifactIntent extends IntentBase {
  actionType: 'unsubscribe_artifact';
  artifactId: string;
}

export interface ConfigureContextIntent extends IntentBase {
  actionType: 'configure_context';
  sections: Record<string, boolean>;
  priorities?: Record<string, number>;
}

export interface SubmitToTaskIntent extends IntentBase {
  actionType: 'submit_to_task';
  artifactId: string;
  taskId: string;
}

export interface UpdateMetadataIntent extends IntentBase {
  actionType: 'update_metadata';
  artifactId: string;
  key: string;
  /** null removes the key. */
  value: JsonValue;
}

export interface QueryKernelIntent extends IntentBase {
  actionType: 'query_kernel';
  queryType: string;
  params: Record<string, JsonValue>;
}

export type ActionIntent =
  | NoopIntent
  | ReadArtifactIntent
  | WriteArtifactIntent
  | EditArtifactIntent
  | InvokeArtifactIntent
  | DeleteArtifactIntent
  | TransferIntent
  | MintIntent
  | CancelMintIntent
  | SubscribeArtifactIntent
  | UnsubscribeArtifactIntent
  | ConfigureContextIntent
  | SubmitToTaskIntent
  | UpdateMetadataIntent
  | QueryKernelIntent;

export function isActionType(value: string): value is ActionType {
  return ACTION_TYPES.some((type) => type === value);
}

// --- Field readers ---

class FieldError extends Error {
  constructor(public readonly kernelError: KernelError) {
    super(kernelError.message);
  }
}

type Wire = Record<string, unknown>;

function requireString(data: Wire, action: string, key: string): string {
  const value = data[key];
  if (value === undefined || value === null || value === '') {
    throw new FieldError(validationError('missing_argument', `${action} requires '${key}'`, { field: key }));
  }
  if (typeof value !== 'string') {
    throw new FieldError(validationError('invalid_type', `'${key}' must be a string`, { field: key }));
  }
  return value;
}

function optionalString(data: Wire, key: string): string | undefined {
  const value = data[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new FieldError(validationError('invalid_type', `'${key}' must be a string`, { field: key }));
  }
  return value;
}

/** Raw string that may legitimately be empty. */
function requirePresentString(data: Wire, action: string, key: string): string {
  const value = data[key];
  if (value === undefined || value === null) {
    throw new FieldError(validationError('missing_argument', `${action} requires '${key}'`, { field: key }));
  }
  if (typeof value !== 'string') {
    throw new FieldError(validationError('invalid_type', `'${key}' must be a string`, { field: key }));
  }
  return value;
}

function nonNegativeInteger(data: Wire, key: string, fallback: number): number {
  const value = data[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new FieldError(validationError('invalid_argument', `'${key}' must be a non-negative integer`, { field: key }));
  }
  return value;
}

function positiveInteger(data: Wire, action: string, key: string): number {
  const value = data[key];
  if (value === undefined || value === null) {
    throw new FieldError(validationError('missing_argument', `${action} requires '${key}'`, { field: key }));
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new FieldError(validationError('invalid_argument', `'${key}' must be a positive integer`, { field: key }));
  }
  return value;
}

function optionalBoolean(data: Wire, key: string, fallback: boolean): boolean {
  const value = data[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'boolean') {
    throw new FieldError(validationError('invalid_type', `'${key}' must be a boolean`, { field: key }));
  }
  return value;
}

function optionalMetadata(data: Wire, key: string): ArtifactMetadata | undefined {
  const value = data[key];
  if (value === undefined || value === null) return undefined;
  if (!isJsonObject(value)) {
    throw new FieldError(validationError('invalid_type', `'${key}' must be a JSON object`, { field: key }));
  }
  return value;
}

function parseInterface(data: Wire): ArtifactInterface | undefined {
  const value = data.interface;
  if (value === undefined || value === null) return undefined;
  if (!isJsonObject(value) || !Array.isArray(value.methods)) {
    throw new FieldError(validationError('invalid_type', "'interface' must be an object with a 'methods' array"));
  }
  const methods: ArtifactInterface['methods'] = [];
  for (const method of value.methods) {
    if (!isJsonObject(method) || typeof method.name !== 'string') {
      throw new FieldError(validationError('invalid_argument', "each interface method needs a string 'name'"));
    }
    const entry: ArtifactInterface['methods'][number] = { name: method.name };
    if (typeof method.description === 'string') entry.description = method.description;
    if (isJsonObject(method.args)) entry.args = method.args;
    if (typeof method.cost === 'number') entry.cost = method.cost;
    methods.push(entry);
  }
  const parsed: ArtifactInterface = { methods };
  if (typeof value.description === 'string') parsed.description = value.description;
  return parsed;
}

function booleanMap(data: Wire, key: string): Record<string, boolean> {
  const value = data[key];
  if (!isRecord(value)) {
    throw new FieldError(validationError('invalid_type', `'${key}' must be an object of booleans`, { field: key }));
  }
  const out: Record<string, boolean> = {};
  for (const [name, flag] of Object.entries(value)) {
    if (typeof flag !== 'boolean') {
      throw new FieldError(validationError('invalid_type', `'${key}.${name}' must be a boolean`, { field: key }));
    }
    out[name] = flag;
  }
  return out;
}

function numberMap(data: Wire, key: string): Record<string, number> | undefined {
  const value = data[key];
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    throw new FieldError(validationError('invalid_type', `'${key}' must be an object of numbers`, { field: key }));
  }
  const out: Record<string, number> = {};
  for (const [name, n] of Object.entries(value)) {
    if (typeof n !== 'number' || !Number.isFinite(n)) {
      throw new FieldError(validationError('invalid_type', `'${key}.${name}' must be a number`, { field: key }));
    }
    out[name] = n;
  }
  return out;
}

function buildIntent(actionType: ActionType, principalId: string, data: Wire): ActionIntent {
  switch (actionType) {
    case 'noop':
      return { actionType, principalId };
    case 'read_artifact':
    case 'delete_artifact':
    case 'subscribe_artifact':
    case 'unsubscribe_artifact':
      return { actionType, principalId, artifactId: requireString(data, actionType, 'artifact_id') };
    case 'write_artifact': {
      const intent: WriteArtifactIntent = {
        actionType,
        principalId,
        artifactId: requireString(data, actionType, 'artifact_id'),
        artifactType: optionalString(data, 'artifact_type') ?? 'generic',
        content: optionalString(data, 'content') ?? '',
        executable: optionalBoolean(data, 'executable', false),
        price: nonNegativeInteger(data, 'price', 0),
        readPrice: nonNegativeInteger(data, 'read_price', 0),
        hasStanding: optionalBoolean(data, 'has_standing', false),
      };
      const code = optionalString(data, 'code');
      if (code !== undefined) intent.code = code;
      const contractId = optionalString(data, 'access_contract_id');
      if (contractId !== undefined) intent.accessContractId = contractId;
      const metadata = optionalMetadata(data, 'metadata');
      if (metadata !== undefined) intent.metadata = metadata;
      const iface = parseInterface(data);
      if (iface !== undefined) intent.interface = iface;
      if (intent.executable && !intent.code) {
        throw new FieldError(validationError('missing_argument', "executable artifact requires 'code'", { field: 'code' }));
      }
      return intent;
    }
    case 'edit_artifact':
      return {
        actionType,
        principalId,
        artifactId: requireString(data, actionType, 'artifact_id'),
        oldString: requirePresentString(data, actionType, 'old_string'),
        newString: requirePresentString(data, actionType, 'new_string'),
      };
    case 'invoke_artifact': {
      const args = data.args ?? [];
      if (!Array.isArray(args) || !args.every(isJsonValue)) {
        throw new FieldError(validationError('invalid_type', "invoke_artifact 'args' must be a JSON array", { field: 'args' }));
      }
      return {
        actionType,
        principalId,
        artifactId: requireString(data, actionType, 'artifact_id'),
        method: requireString(data, actionType, 'method'),
        args,
      };
    }
    case 'transfer': {
      const intent: TransferIntent = {
        actionType,
        principalId,
        recipientId: requireString(data, actionType, 'recipient_id'),
        amount: positiveInteger(data, actionType, 'amount'),
      };
      const memo = optionalString(data, 'memo');
      if (memo !== undefined) intent.memo = memo;
      return intent;
    }
    case 'mint':
      return {
        actionType,
        principalId,
        artifactId: requireString(data, actionType, 'artifact_id'),
        bid: positiveInteger(data, actionType, 'bid'),
      };
    case 'cancel_mint':
      return { actionType, principalId, submissionId: requireString(data, actionType, 'submission_id') };
    case 'configure_context': {
      const intent: ConfigureContextIntent = {
        actionType,
        principalId,
        sections: booleanMap(data, 'sections'),
      };
      const priorities = numberMap(data, 'priorities');
      if (priorities !== undefined) intent.priorities = priorities;
      return intent;
    }
    case 'submit_to_task':
      return {
        actionType,
        principalId,
        artifactId: requireString(data, actionType, 'artifact_id'),
        taskId: requireString(data, actionType, 'task_id'),
      };
    case 'update_metadata': {
      const value = data.value === undefined ? null : data.value;
      if (!isJsonValue(value)) {
        throw new FieldError(validationError('invalid_type', "'value' must be JSON", { field: 'value' }));
      }
      return {
        actionType,
        principalId,
        artifactId: requireString(data, actionType, 'artifact_id'),
        key: requireString(data, actionType, 'key'),
        value,
      };
    }
    case 'query_kernel':
      return {
        actionType,
        principalId,
        queryType: requireString(data, actionType, 'query_type'),
        params: optionalMetadata(data, 'params') ?? {},
      };
  }
}

/**
 * Parse a wire intent. The principal id comes from the verified transport
 * (`principalId`) when given, otherwise from the `principal_id` field.
 */
export function parseIntent(raw: unknown, principalId?: string): Result<ActionIntent> {
  if (!isRecord(raw)) {
    return err(validationError('invalid_type', 'Intent must be a JSON object'));
  }
  const rawType = raw.action_type;
  if (typeof rawType !== 'string' || rawType.length === 0) {
    return err(validationError('missing_argument', "Intent requires 'action_type'", { field: 'action_type' }));
  }
  const actionType = rawType.toLowerCase();
  if (!isActionType(actionType)) {
    return err(
      validationError('invalid_argument', `Unknown action_type: ${rawType}`, { validTypes: [...ACTION_TYPES] }),
    );
  }
  const principal = principalId ?? raw.principal_id;
  if (typeof principal !== 'string' || principal.length === 0) {
    return err(validationError('missing_argument', "Intent requires 'principal_id'", { field: 'principal_id' }));
  }
  try {
    return ok(buildIntent(actionType, principal, raw));
  } catch (error) {
    if (error instanceof FieldError) return err(error.kernelError);
    throw error;
  }
}

const LOGGED_CONTENT_LIMIT = 200;

function truncate(value: string): string {
  return value.length > LOGGED_CONTENT_LIMIT ? `${value.slice(0, LOGGED_CONTENT_LIMIT)}...` : value;
}

/** Wire form of an intent for the event log. Long strings are truncated. */
export function intentToWire(intent: ActionIntent): Record<string, JsonValue> {
  const base: Record<string, JsonValue> = {
    action_type: intent.actionType,
    principal_id: intent.principalId,
  };
  switch (intent.actionType) {
    case 'noop':
      return base;
    case 'read_artifact':
    case 'delete_artifact':
    case 'subscribe_artifact':
    case 'unsubscribe_artifact':
      return { ...base, artifact_id: intent.artifactId };
    case 'write_artifact': {
      const wire: Record<string, JsonValue> = {
        ...base,
        artifact_id: intent.artifactId,
        artifact_type: intent.artifactType,
        content: truncate(intent.content),
        executable: intent.executable,
        price: intent.price,
      };
      if (intent.readPrice > 0) wire.read_price = intent.readPrice;
      if (intent.code !== undefined) wire.code = truncate(intent.code);
      if (intent.accessContractId !== undefined) wire.access_contract_id = intent.accessContractId;
      if (intent.metadata !== undefined) wire.metadata = intent.metadata;
      if (intent.hasStanding) wire.has_standing = true;
      return wire;
    }
    case 'edit_artifact':
      return {
        ...base,
        artifact_id: intent.artifactId,
        old_string: truncate(intent.oldString),
        new_string: truncate(intent.newString),
      };
    case 'invoke_artifact':
      return { ...base, artifact_id: intent.artifactId, method: intent.method, args: intent.args };
    case 'transfer': {
      const wire: Record<string, JsonValue> = { ...base, recipient_id: intent.recipientId, amount: intent.amount };
      if (intent.memo !== undefined) wire.memo = intent.memo;
      return wire;
    }
    case 'mint':
      return { ...base, artifact_id: intent.artifactId, bid: intent.bid };
    case 'cancel_mint':
      return { ...base, submission_id: intent.submissionId };
    case 'configure_context': {
      const wire: Record<string, JsonValue> = { ...base, sections: intent.sections };
      if (intent.priorities) wire.priorities = intent.priorities;
      return wire;
    }
    case 'submit_to_task':
      return { ...base, artifact_id: intent.artifactId, task_id: intent.taskId };
    case 'update_metadata':
      return { ...base, artifact_id: intent.artifactId, key: intent.key, value: intent.value };
    case 'query_kernel':
      return { ...base, query_type: intent.queryType, params: intent.params };
  }
}
