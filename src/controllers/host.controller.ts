import {
  ConfigurationError,
  ImmutableFieldError,
  NotFoundError,
  ProtocolMixError,
  RemoteOperationError,
  fail,
  isHostError,
  ok,
  type HostError,
  type RemoteOperation,
  type Result,
} from '../lib/errors';
import type { HostSelector } from '../lib/host-spec';
import {
  computeAdditions,
  computeRemovals,
  effectivePortType,
  isSubset,
  validateInitiatorAuth,
} from '../lib/initiators';
import rootLogger, { type Logger } from '../lib/logger';
import type { HostRepository } from '../services/host-repository';
import {
  PORT_TYPES,
  type CreateHostParams,
  type HostSpec,
  type InitiatorDetail,
  type InitiatorRequest,
  type ModifyHostParams,
  type ObservedHost,
  type ReconcileResult,
} from '../types/host';

function requestedInitiators(spec: HostSpec): InitiatorDetail[] {
  if (spec.detailedInitiators) return spec.detailedInitiators;
  return (spec.initiators ?? []).map((portName) => ({ portName }));
}

function toInitiatorRequest(detail: InitiatorDetail): InitiatorRequest {
  const portType = effectivePortType(detail);
  const request: InitiatorRequest = { portName: detail.portName, portType };
  // CHAP only travels with iSCSI ports
  if (portType === 'iSCSI') {
    if (detail.chapSingleUsername !== undefined) request.chapSingleUsername = detail.chapSingleUsername;
    if (detail.chapSinglePassword !== undefined) request.chapSinglePassword = detail.chapSinglePassword;
    if (detail.chapMutualUsername !== undefined) request.chapMutualUsername = detail.chapMutualUsername;
    if (detail.chapMutualPassword !== undefined) request.chapMutualPassword = detail.chapMutualPassword;
  }
  return request;
}

function portNames(host: ObservedHost): string[] {
  return host.hostInitiators.map((init) => init.portName);
}

/**
 * Converges one host on the array towards a HostSpec.
 *
 * A pass runs in a fixed order: resolve identity, check preconditions,
 * create if absent, add or remove initiators, rename / change connectivity,
 * delete. Every precondition is checked before the first mutating call, and
 * a failing call ends the pass. Each step issues at most one request and
 * skips it when the array already matches.
 */
export class HostController {
  constructor(
    private readonly repository: HostRepository,
    private readonly log: Logger = rootLogger.child('host')
  ) {}

  async reconcile(spec: HostSpec): Promise<Result<ReconcileResult>> {
    try {
      return ok(await this.converge(spec));
    } catch (err) {
      if (!isHostError(err)) throw err;
      this.logFailure('reconcile failed', err, { name: spec.name, id: spec.id });
      return fail(err);
    }
  }

  /**
   * Read-only lookup of a host by name or id.
   */
  async describe(selector: HostSelector): Promise<Result<ObservedHost>> {
    try {
      const reference = 'name' in selector ? selector.name : selector.id;
      const host =
        'name' in selector ? await this.findByName(selector.name) : await this.findById(selector.id);
      if (!host) throw new NotFoundError(reference);
      return ok(host);
    } catch (err) {
      if (!isHostError(err)) throw err;
      this.logFailure('describe failed', err, { selector });
      return fail(err);
    }
  }

  private async converge(spec: HostSpec): Promise<ReconcileResult> {
    const host = await this.resolveHost(spec);
    this.checkPreconditions(spec, host);

    const createParams =
      !host && spec.desiredExistence === 'present' ? this.planCreate(spec) : undefined;

    let changed = false;
    let hostId = host?.id;

    if (createParams) {
      hostId = await this.createHost(createParams);
      changed = true;
    }

    if (host && spec.desiredExistence === 'present') {
      if (spec.initiatorIntent === 'present-in-host') {
        changed = (await this.addInitiators(host, spec)) || changed;
      } else if (spec.initiatorIntent === 'absent-in-host') {
        changed = (await this.removeInitiators(host, spec)) || changed;
      }
      changed = (await this.modifyHost(host, spec)) || changed;
    }

    if (host && spec.desiredExistence === 'absent') {
      await this.deleteHost(host);
      changed = true;
    }

    this.log.info('reconcile finished', { name: spec.name ?? host?.name, id: hostId, changed });

    if (spec.desiredExistence === 'absent') {
      return { changed, hostDetails: {} };
    }
    if (!hostId) {
      throw new NotFoundError(spec.id ?? spec.name ?? '');
    }
    const current = await this.findById(hostId);
    if (!current) {
      throw new NotFoundError(hostId);
    }
    return { changed, hostDetails: current };
  }

  private async resolveHost(spec: HostSpec): Promise<ObservedHost | undefined> {
    if (spec.name !== undefined) {
      return this.findByName(spec.name);
    }
    if (spec.id !== undefined) {
      const host = await this.findById(spec.id);
      if (!host && spec.desiredExistence === 'present') {
        throw new NotFoundError(spec.id);
      }
      return host;
    }
    throw new ConfigurationError('one of the following is required: name, id');
  }

  private async findByName(name: string): Promise<ObservedHost | undefined> {
    const summary = await this.remote('lookup', name, () => this.repository.findByName(name));
    if (!summary) {
      this.log.debug('host not found by name', { name });
      return undefined;
    }
    return this.findById(summary.id);
  }

  private async findById(id: string): Promise<ObservedHost | undefined> {
    return this.remote('get', id, () => this.repository.findById(id));
  }

  private checkPreconditions(spec: HostSpec, host: ObservedHost | undefined): void {
    const hasInitiators =
      (spec.initiators?.length ?? 0) > 0 || (spec.detailedInitiators?.length ?? 0) > 0;

    if (spec.initiatorIntent && !hasInitiators) {
      throw new ConfigurationError(
        'initiators or detailedInitiators are mandatory along with initiatorIntent. Please provide a valid value.'
      );
    }
    if (hasInitiators && !spec.initiatorIntent) {
      throw new ConfigurationError(
        'initiatorIntent is mandatory along with initiators or detailedInitiators. Please provide a valid value.'
      );
    }

    if (!host && spec.desiredExistence === 'present') {
      if (spec.newName !== undefined) {
        throw new ConfigurationError(
          `Operation on host failed as newName is given for host '${spec.name}' that does not exist.`
        );
      }
      if (spec.initiatorIntent !== 'present-in-host') {
        throw new ConfigurationError('Incorrect initiatorIntent specified for create host; expected present-in-host');
      }
      if (!spec.osType) {
        throw new ConfigurationError(`Create host '${spec.name}' failed as osType is not specified`);
      }
    }

    if (host && spec.osType && spec.osType !== host.osType) {
      throw new ImmutableFieldError('osType', host.osType, spec.osType);
    }

    if (spec.initiatorIntent && spec.detailedInitiators) {
      validateInitiatorAuth(spec.detailedInitiators);
    }
  }

  private planCreate(spec: HostSpec): CreateHostParams {
    if (spec.name === undefined || spec.osType === undefined) {
      throw new ConfigurationError('Create host requires name and osType');
    }

    const initiators = requestedInitiators(spec).map(toInitiatorRequest);
    const families = new Set(initiators.map((init) => init.portType));
    // Only the full three-way mix is refused; two families are accepted.
    if (PORT_TYPES.every((portType) => families.has(portType))) {
      throw new ProtocolMixError(initiators.map((init) => init.portName));
    }

    return {
      name: spec.name,
      osType: spec.osType,
      initiators,
      ...(spec.connectivity ? { connectivity: spec.connectivity } : {}),
    };
  }

  private async createHost(params: CreateHostParams): Promise<string> {
    this.log.info('creating host', {
      name: params.name,
      osType: params.osType,
      initiators: params.initiators,
      connectivity: params.connectivity,
    });
    const created = await this.remote(
      'create',
      params.name,
      () => this.repository.create(params),
      params.initiators.map((init) => init.portName)
    );
    this.log.info('host created', { name: params.name, id: created.id });
    return created.id;
  }

  private async addInitiators(host: ObservedHost, spec: HostSpec): Promise<boolean> {
    const existing = portNames(host);
    const requested = requestedInitiators(spec);
    const requestedNames = requested.map((init) => init.portName);

    if (isSubset(requestedNames, existing)) {
      this.log.info('initiators already present in host', { name: host.name });
      return false;
    }

    const pending = new Set(computeAdditions(existing, requestedNames));
    const additions = requested.filter((init) => pending.delete(init.portName)).map(toInitiatorRequest);
    if (additions.length === 0) {
      this.log.info('no initiators to add to host', { name: host.name });
      return false;
    }

    const names = additions.map((init) => init.portName);
    this.log.info('adding initiators to host', { name: host.name, initiators: additions });
    await this.remote(
      'add_initiators',
      host.name,
      () => this.repository.modify(host.id, { addInitiators: additions }),
      names
    );
    return true;
  }

  private async removeInitiators(host: ObservedHost, spec: HostSpec): Promise<boolean> {
    const existing = portNames(host);
    if (existing.length === 0) {
      this.log.info('no initiators are present in host', { name: host.name });
      return false;
    }

    const removals = computeRemovals(
      existing,
      requestedInitiators(spec).map((init) => init.portName)
    );
    if (removals.length === 0) {
      this.log.info('no initiators to remove from host', { name: host.name });
      return false;
    }

    this.log.info('removing initiators from host', { name: host.name, initiators: removals });
    await this.remote(
      'remove_initiators',
      host.name,
      () => this.repository.modify(host.id, { removeInitiators: removals }),
      removals
    );
    return true;
  }

  private async modifyHost(host: ObservedHost, spec: HostSpec): Promise<boolean> {
    const changes: ModifyHostParams = {};
    if (spec.newName !== undefined && spec.newName !== host.name) {
      changes.name = spec.newName;
    }
    if (spec.connectivity !== undefined && spec.connectivity !== host.connectivity) {
      changes.connectivity = spec.connectivity;
    }
    if (changes.name === undefined && changes.connectivity === undefined) {
      return false;
    }

    this.log.info('modifying host', { name: host.name, changes });
    await this.remote('modify', host.name, () => this.repository.modify(host.id, changes));
    return true;
  }

  private async deleteHost(host: ObservedHost): Promise<void> {
    this.log.info('deleting host', { name: host.name, id: host.id });
    await this.remote('delete', host.name, () => this.repository.delete(host.id));
  }

  /**
   * Run one repository call, wrapping transport failures with the operation and target.
   */
  private async remote<T>(
    operation: RemoteOperation,
    target: string,
    call: () => Promise<T>,
    initiators?: string[]
  ): Promise<T> {
    try {
      return await call();
    } catch (err) {
      if (isHostError(err)) throw err;
      throw new RemoteOperationError(operation, target, err, initiators);
    }
  }

  private logFailure(message: string, err: HostError, meta: Record<string, unknown>): void {
    this.log.error(message, { ...meta, kind: err.kind, err });
  }
}
