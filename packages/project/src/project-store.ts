/**
 * @module project-store
 * Saves and loads the object graph of a session to project files, keeping the
 * command history consistent with what is on disk.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  ProjectFileError,
  SerializationTypeError,
  createLogger,
  describeError,
  generateId,
} from '@reversible/core';
import type { Session } from '@reversible/core';
import type {
  DeserializedGraph,
  HistoryCapture,
  HistorySnapshot,
  Logger,
  ObservableObject,
} from '@reversible/types';
import { writeFileAtomic } from './atomic-write';
import { decodeProject, encodeProject, formatForPath } from './format';

export interface ProjectStoreOptions {
  /** Store the command history in archives and restore it on load (default false). */
  persistHistory?: boolean;
  logger?: Logger;
}

/**
 * Coordinates project files with a {@link Session}.
 *
 * Emits `project:saving`/`project:saved` and `project:loading`/`project:loaded`
 * on the session's event bus. Loading or starting a project clears the
 * command history, since recorded commands point at the previous graph.
 */
export class ProjectStore {
  private readonly session: Session;
  private readonly persistHistory: boolean;
  private readonly logger: Logger;

  private path: string | null = null;
  private projectName = 'Untitled';
  private createdAt = new Date();

  constructor(session: Session, options: ProjectStoreOptions = {}) {
    this.session = session;
    this.persistHistory = options.persistHistory ?? false;
    this.logger = options.logger ?? createLogger('project', session.logging);
  }

  /** Path of the file last saved or loaded, or null for a new project. */
  get currentPath(): string | null {
    return this.path;
  }

  /** Display name, taken from the manifest or the file name. */
  get name(): string {
    return this.projectName;
  }

  /**
   * Start an empty project whose single root is a fresh instance of
   * `typeName`.
   * @throws SerializationTypeError when the type is not registered.
   */
  newProject(typeName: string, name = 'Untitled'): ObservableObject {
    const registration = this.session.types.lookup(typeName);
    if (!registration) {
      throw new SerializationTypeError(`Unknown type "${typeName}"`);
    }
    const root = registration.create(generateId());
    this.session.identities.register(root);
    this.session.commands.clear();
    this.path = null;
    this.projectName = name;
    this.createdAt = new Date();
    return root;
  }

  /**
   * Write the graph reachable from `roots` to `filePath`, or to the current
   * path when omitted.
   *
   * With `persistHistory`, archives also carry the undo history, and every
   * object it refers to is written with the graph. A history holding a
   * command without serializable state is left out with a warning.
   * @returns The path written.
   */
  save(roots: readonly ObservableObject[], filePath?: string): string {
    const target = filePath ?? this.path;
    if (target === null) {
      throw new ProjectFileError('No file path given for an unsaved project');
    }
    const { events, serializer } = this.session;

    events.emit('project:saving', { path: target });
    try {
      const format = formatForPath(target);
      let history: HistorySnapshot | undefined;
      let retain: readonly ObservableObject[] = [];
      if (this.persistHistory && format === 'archive') {
        const capture = this.captureHistory(target);
        if (capture) {
          history = capture.snapshot;
          retain = capture.references;
        }
      }
      const document = serializer.serialize(roots, { retain });
      const data = encodeProject(document, format, {
        name: this.projectName,
        createdAt: this.createdAt,
        history,
      });
      writeFileAtomic(target, data);
    } catch (error) {
      this.logger.error(`Saving ${target} failed: ${describeError(error)}`);
      events.emit('project:saved', { path: target, success: false });
      throw error;
    }

    this.path = target;
    this.logger.info(`Saved ${target}`);
    events.emit('project:saved', { path: target, success: true });
    return target;
  }

  /**
   * Read `filePath` and rebuild its graph. A stored history is rebuilt
   * against the objects of this file only.
   * @returns The roots in document order.
   */
  load(filePath: string): ObservableObject[] {
    const { events, serializer, commands } = this.session;

    events.emit('project:loading', { path: filePath });
    let graph: DeserializedGraph;
    let history: unknown = null;
    try {
      const contents = decodeProject(readProjectFile(filePath), formatForPath(filePath));
      graph = serializer.deserializeGraph(contents.document);
      commands.clear();
      this.projectName = contents.manifest?.name ?? path.basename(filePath, path.extname(filePath));
      this.createdAt = contents.manifest ? new Date(contents.manifest.createdAt) : new Date();
      history = contents.history;
    } catch (error) {
      this.logger.error(`Loading ${filePath} failed: ${describeError(error)}`);
      events.emit('project:loaded', { path: filePath, success: false });
      throw error;
    }

    if (this.persistHistory && history !== null) {
      const { objects } = graph;
      try {
        commands.restoreHistory(history, { resolve: (id) => objects.get(id) });
      } catch (error) {
        // The graph itself loaded; start with an empty history instead.
        this.logger.warn(`History of ${filePath} was not restored: ${describeError(error)}`);
        commands.clear();
      }
    }

    this.path = filePath;
    events.emit('project:loaded', { path: filePath, success: true });
    return graph.roots;
  }

  private captureHistory(target: string): HistoryCapture | undefined {
    try {
      return this.session.commands.captureHistory();
    } catch (error) {
      if (!(error instanceof SerializationTypeError)) throw error;
      this.logger.warn(`History of ${target} was not saved: ${error.message}`);
      return undefined;
    }
  }
}

function readProjectFile(filePath: string): Uint8Array {
  try {
    return fs.readFileSync(filePath);
  } catch (error) {
    throw new ProjectFileError(`Could not read ${filePath}`, { cause: error });
  }
}
