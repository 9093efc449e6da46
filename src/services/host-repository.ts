import { z } from 'zod';
import { AmbiguousNameError } from '../lib/errors';
import type {
  CreateHostParams,
  HostSummary,
  InitiatorRequest,
  ModifyHostParams,
  ObservedHost,
} from '../types/host';
import { ArrayApiError, type ArrayApi, type WireInitiator } from './array-api';

/**
 * Persistence boundary for host objects. The planner only talks to this.
 */
export interface HostRepository {
  findByName(name: string): Promise<HostSummary | undefined>;
  findById(id: string): Promise<ObservedHost | undefined>;
  create(params: CreateHostParams): Promise<HostSummary>;
  modify(id: string, params: ModifyHostParams): Promise<void>;
  delete(id: string): Promise<void>;
}

export type HostApi = Pick<ArrayApi, 'getHostsByName' | 'getHost' | 'createHost' | 'modifyHost' | 'deleteHost'>;

const hostSummarySchema = z.object({
  id: z.string(),
  name: z.string(),
});

const wireInitiatorSchema = z.object({
  port_name: z.string(),
  port_type: z.string(),
  chap_single_username: z.string().nullish(),
  chap_mutual_username: z.string().nullish(),
  active_sessions: z.array(z.record(z.unknown())).nullish(),
});

const wireHostSchema = z.object({
  id: z.string(),
  name: z.string(),
  os_type: z.string(),
  host_connectivity: z.string().nullish(),
  host_initiators: z.array(wireInitiatorSchema).nullish(),
});

const createdSchema = z.object({ id: z.string() });

function parseWire<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, what: string): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ArrayApiError(`Unexpected ${what} response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
  }
  return parsed.data;
}

function isNotFound(err: unknown): boolean {
  return err instanceof ArrayApiError && err.status === 404;
}

export function toObservedHost(raw: unknown): ObservedHost {
  const host = parseWire(wireHostSchema, raw, 'host');
  return {
    id: host.id,
    name: host.name,
    osType: host.os_type,
    connectivity: host.host_connectivity ?? '',
    hostInitiators: (host.host_initiators ?? []).map((init) => ({
      portName: init.port_name,
      portType: init.port_type,
      chapSingleUsername: init.chap_single_username ?? null,
      chapMutualUsername: init.chap_mutual_username ?? null,
      activeSessions: init.active_sessions ?? [],
    })),
  };
}

export function toWireInitiator(init: InitiatorRequest): WireInitiator {
  const wire: WireInitiator = { port_name: init.portName, port_type: init.portType };
  if (init.chapSingleUsername !== undefined) wire.chap_single_username = init.chapSingleUsername;
  if (init.chapSinglePassword !== undefined) wire.chap_single_password = init.chapSinglePassword;
  if (init.chapMutualUsername !== undefined) wire.chap_mutual_username = init.chapMutualUsername;
  if (init.chapMutualPassword !== undefined) wire.chap_mutual_password = init.chapMutualPassword;
  return wire;
}

/**
 * HostRepository backed by the array REST API.
 */
export class ArrayHostRepository implements HostRepository {
  constructor(private readonly api: HostApi) {}

  async findByName(name: string): Promise<HostSummary | undefined> {
    let raw: unknown;
    try {
      raw = await this.api.getHostsByName(name);
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
    const matches = parseWire(z.array(hostSummarySchema), raw, 'host lookup');
    if (matches.length > 1) {
      throw new AmbiguousNameError(name, matches.length);
    }
    return matches[0];
  }

  async findById(id: string): Promise<ObservedHost | undefined> {
    try {
      return toObservedHost(await this.api.getHost(id));
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
  }

  async create(params: CreateHostParams): Promise<HostSummary> {
    const raw = await this.api.createHost({
      name: params.name,
      os_type: params.osType,
      initiators: params.initiators.map(toWireInitiator),
      ...(params.connectivity ? { host_connectivity: params.connectivity } : {}),
    });
    const created = parseWire(createdSchema, raw, 'create host');
    return { id: created.id, name: params.name };
  }

  async modify(id: string, params: ModifyHostParams): Promise<void> {
    await this.api.modifyHost(id, {
      ...(params.addInitiators ? { add_initiators: params.addInitiators.map(toWireInitiator) } : {}),
      ...(params.removeInitiators ? { remove_initiators: params.removeInitiators } : {}),
      ...(params.name !== undefined ? { name: params.name } : {}),
      ...(params.connectivity !== undefined ? { host_connectivity: params.connectivity } : {}),
    });
  }

  async delete(id: string): Promise<void> {
    await this.api.deleteHost(id);
  }
}
