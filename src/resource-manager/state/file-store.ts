import fs from 'fs-extra';
import path from 'path';
import { BaseStateStore, cloneRecord, StateRecord } from '.';
import { Dictionary } from '../utils/dictionary';
import { TierformError } from '../utils/errors';
import { KeyedMutex } from '../utils/keyed-mutex';

interface StateFile {
  version: number;
  serial: number;
  resources: Dictionary<StateRecord>;
}

const STATE_FILE_VERSION = 1;
const FILE_LOCK = '__state_file__';

/**
 * JSON state file. Nothing is cached: reads go to disk, and every write re-reads the file, applies its change, bumps
 * the serial and lands through a temp file + rename. Other processes on the same state dir (a running `autoscale`
 * next to an `apply`) only ever replace whole records.
 */
export class FileStateStore extends BaseStateStore {
  readonly state_path: string;
  private file_lock = new KeyedMutex();

  constructor(state_path: string) {
    super();
    this.state_path = state_path;
  }

  private async load(): Promise<StateFile> {
    if (!(await fs.pathExists(this.state_path))) {
      return { version: STATE_FILE_VERSION, serial: 0, resources: {} };
    }

    const contents: StateFile = await fs.readJSON(this.state_path);
    if (contents.version !== STATE_FILE_VERSION) {
      throw new TierformError(`Unsupported state file version ${contents.version} in ${this.state_path}`);
    }
    return contents;
  }

  private async write(mutate: (state: StateFile) => void): Promise<void> {
    await this.file_lock.runExclusive(FILE_LOCK, async () => {
      const state = await this.load();
      mutate(state);
      state.serial += 1;

      await fs.ensureDir(path.dirname(this.state_path));
      const tmp_path = `${this.state_path}.${process.pid}.tmp`;
      await fs.writeJSON(tmp_path, state, { spaces: 2 });
      await fs.move(tmp_path, this.state_path, { overwrite: true });
    });
  }

  async serial(): Promise<number> {
    return (await this.load()).serial;
  }

  async get(resource_id: string): Promise<StateRecord | undefined> {
    const record = (await this.load()).resources[resource_id];
    return record ? cloneRecord(record) : undefined;
  }

  async list(): Promise<StateRecord[]> {
    return Object.values((await this.load()).resources).map(cloneRecord);
  }

  async put(record: StateRecord): Promise<void> {
    await this.write((state) => {
      state.resources[record.resource_id] = cloneRecord(record);
    });
  }

  async delete(resource_id: string): Promise<void> {
    await this.write((state) => {
      delete state.resources[resource_id];
    });
  }
}
