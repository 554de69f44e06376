import fs from 'fs-extra';
import path from 'path';
import { ObservedResource, ProvisionResult, ResourceProvider, ResourceStatus } from '.';
import { ResourceType } from '../schema/resource-types';
import { Dictionary } from '../utils/dictionary';
import { ProviderError } from '../utils/errors';
import { KeyedMutex } from '../utils/keyed-mutex';
import { Refs } from '../utils/refs';

interface LocalObject {
  type: ResourceType;
  resource_id: string;
  attributes: Dictionary<unknown>;
  outputs: Dictionary<unknown>;
  created_at: string;
}

interface LocalProviderFile {
  objects: Dictionary<LocalObject>;
}

export const LOCAL_PROVIDER_FILENAME = 'provider.json';

/**
 * Provider that keeps provisioned objects in a JSON file. Objects are ready as soon as they're created; useful for
 * trying declarations out and for driving the autoscaler without a cloud account.
 */
export class LocalProvider implements ResourceProvider {
  private lock = new KeyedMutex();
  private sequence = 0;

  constructor(readonly file_path: string, protected now: () => number = Date.now) { }

  static forStateDir(state_dir: string): LocalProvider {
    return new LocalProvider(path.join(state_dir, LOCAL_PROVIDER_FILENAME));
  }

  private async load(): Promise<LocalProviderFile> {
    if (!(await fs.pathExists(this.file_path))) {
      return { objects: {} };
    }
    return fs.readJSON(this.file_path);
  }

  private async mutate<T>(fn: (contents: LocalProviderFile) => T): Promise<T> {
    return this.lock.runExclusive(this.file_path, async () => {
      const contents = await this.load();
      const res = fn(contents);
      await fs.ensureDir(path.dirname(this.file_path));
      const tmp_path = `${this.file_path}.tmp`;
      await fs.writeJSON(tmp_path, contents, { spaces: 2 });
      await fs.move(tmp_path, this.file_path, { overwrite: true });
      return res;
    });
  }

  protected outputsFor(type: ResourceType, provider_assigned_id: string): Dictionary<unknown> {
    const outputs: Dictionary<unknown> = { arn: `arn:local:${type}/${provider_assigned_id}` };
    if (type === ResourceType.LOAD_BALANCER) {
      outputs.dns_name = `${provider_assigned_id}.elb.local`;
    }
    return outputs;
  }

  async create(type: ResourceType, resource_id: string, attributes: Dictionary<unknown>): Promise<ProvisionResult> {
    this.sequence += 1;
    const provider_assigned_id = Refs.safeRef(type, `${resource_id}:${this.now()}:${this.sequence}`);
    const outputs = this.outputsFor(type, provider_assigned_id);
    await this.mutate((contents) => {
      contents.objects[provider_assigned_id] = { type, resource_id, attributes, outputs, created_at: new Date(this.now()).toISOString() };
    });
    return { provider_assigned_id, outputs };
  }

  async read(type: ResourceType, provider_assigned_id: string): Promise<ObservedResource | undefined> {
    const object = (await this.load()).objects[provider_assigned_id];
    if (!object || object.type !== type) {
      return undefined;
    }
    return { provider_assigned_id, attributes: object.attributes, outputs: object.outputs };
  }

  async update(type: ResourceType, provider_assigned_id: string, attributes: Dictionary<unknown>): Promise<ProvisionResult> {
    return this.mutate((contents) => {
      const object = contents.objects[provider_assigned_id];
      if (!object || object.type !== type) {
        throw new ProviderError(`${type} ${provider_assigned_id} does not exist`, 'NotFound');
      }
      object.attributes = attributes;
      return { provider_assigned_id, outputs: object.outputs };
    });
  }

  async delete(type: ResourceType, provider_assigned_id: string): Promise<void> {
    await this.mutate((contents) => {
      if (contents.objects[provider_assigned_id]?.type === type) {
        delete contents.objects[provider_assigned_id];
      }
    });
  }

  async status(type: ResourceType, provider_assigned_id: string): Promise<ResourceStatus> {
    if (!(await this.read(type, provider_assigned_id))) {
      throw new ProviderError(`${type} ${provider_assigned_id} is not visible yet`, 'NotFoundYet');
    }
    return 'ready';
  }

  async list(): Promise<Array<{ provider_assigned_id: string } & LocalObject>> {
    const contents = await this.load();
    return Object.entries(contents.objects).map(([provider_assigned_id, object]) => ({ provider_assigned_id, ...object }));
  }
}
