import { existsSync, mkdirSync, readFileSync, statSync, writeFileSync } from 'node:fs';
import { basename, join, resolve } from 'node:path';
import type { CoreConfig } from '../config.js';
import { CorruptContainerError, NotFoundError, PreconditionError, describeError, fail, ok, type Result } from '../errors.js';
import { Project } from '../project/Project.js';
import { decodeContainer, encodeContainer } from './container.js';

export const PROJECT_KIND = 'project';

export interface SaveProjectOptions {
  /** Target directory; `config.outputDir` when omitted. Created if missing. */
  dir?: string;
  /** File name; the project name plus `config.extension` when omitted. */
  name?: string;
}

/** Write a project container and return the path written. */
export function saveProject(
  project: Project,
  config: CoreConfig,
  options: SaveProjectOptions = {},
): Result<string, PreconditionError> {
  const dir = resolve(options.dir ?? config.outputDir);
  if (existsSync(dir) && !statSync(dir).isDirectory()) {
    return fail(new PreconditionError(`Output path (${dir}) is not a directory`));
  }
  const name = options.name ?? `${project.name}${config.extension}`;
  if (!name || basename(name) !== name) {
    return fail(new PreconditionError(`Project file name must be a bare file name, got "${name}"`));
  }

  const path = join(dir, name);
  try {
    mkdirSync(dir, { recursive: true });
    writeFileSync(path, encodeContainer(PROJECT_KIND, project.toJSON()));
  } catch (err) {
    const error = new PreconditionError(`Project could not be written to ${path} (${describeError(err)})`, { cause: err });
    config.logger.error(error.message);
    return fail(error);
  }
  config.logger.info(`Saved project to ${path}`);
  return ok(path);
}

export function loadProject(path: string, config: CoreConfig): Result<Project, NotFoundError | CorruptContainerError> {
  if (!existsSync(path) || !statSync(path).isFile()) {
    config.logger.error(`${path} is not a file, or does not exist`);
    return fail(new NotFoundError(`${path} is not a file, or does not exist`, path));
  }

  let bytes: Buffer;
  try {
    bytes = readFileSync(path);
  } catch (err) {
    const error = new NotFoundError(`${path} could not be read (${describeError(err)})`, path, { cause: err });
    config.logger.error(error.message);
    return fail(error);
  }
  const decoded = decodeContainer(bytes, path);
  if (!decoded.ok) {
    config.logger.error(decoded.error.message);
    return decoded;
  }
  if (decoded.value.kind !== PROJECT_KIND) {
    const error = new CorruptContainerError(
      `${path} is not a valid project file: holds a "${decoded.value.kind}", expected "${PROJECT_KIND}"`,
      path,
    );
    config.logger.error(error.message);
    return fail(error);
  }

  const restored = Project.restore(decoded.value.payload);
  if (!restored.ok) {
    const error = new CorruptContainerError(
      `${path} is not a valid project file: ${restored.error.message}`,
      path,
      { cause: restored.error },
    );
    config.logger.error(error.message);
    return fail(error);
  }
  return restored;
}
