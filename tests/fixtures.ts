import { ChildProcess } from 'child_process';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { PassThrough } from 'stream';
import { ExecutionResult, SfddlConfig, StageToken } from '../src/types';

export const IDENTITY_SCHEMAS: Record<StageToken, string> = { raw: 'raw', stage: 'stage', curated: 'curated' };

export function makeConfig(
  ddlRoot: string,
  options: { schemas?: Record<StageToken, string>; targetSchema?: string; region?: string } = {}
): SfddlConfig {
  return {
    connection: {
      account: 'test-account',
      user: 'test-user',
      password: 'test-secret',
      warehouse: 'TEST_WH',
      database: 'TEST_DB',
      role: 'TEST_ROLE',
      region: options.region,
    },
    client: { path: '/opt/snowsql/snowsql' },
    schemas: options.schemas ?? IDENTITY_SCHEMAS,
    ddl: { root: ddlRoot },
    drop: { targetSchema: options.targetSchema },
  };
}

export function makeResult(overrides: Partial<ExecutionResult> = {}): ExecutionResult {
  return {
    success: true,
    outcome: 'SUCCESS',
    stdout: '',
    stderr: '',
    exitCode: 0,
    durationMs: 5,
    ...overrides,
  };
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'sfddl-test-'));
}

export async function writeDdl(root: string, folder: string, fileName: string, content: string): Promise<string> {
  const folderPath = path.join(root, folder);
  await fs.mkdir(folderPath, { recursive: true });
  const filePath = path.join(folderPath, fileName);
  await fs.writeFile(filePath, content);
  return filePath;
}

export async function removeTempDir(dir: string) {
  await fs.rm(dir, { recursive: true, force: true });
}

export interface FakeRun {
  stdout?: string;
  stderr?: string;
  code?: number | null;
  error?: Error;
}

// Stands in for a snowsql process: emits the given output, then 'close' once both streams have drained
export function fakeChild({ stdout = '', stderr = '', code = 0, error }: FakeRun): ChildProcess {
  const child = new ChildProcess();
  const out = new PassThrough();
  const err = new PassThrough();
  Object.assign(child, { stdout: out, stderr: err });

  setImmediate(() => {
    if (error) {
      child.emit('error', error);
      return;
    }
    let open = 2;
    const finished = () => {
      open -= 1;
      if (open === 0) {
        child.emit('close', code);
      }
    };
    out.on('end', finished);
    err.on('end', finished);
    out.end(stdout);
    err.end(stderr);
  });
  return child;
}
