/**
 * Synthesis pass - one run from loaded documents to an emission plan
 */

import type { CanonicalType } from "../../types/canonical-type.js";
import { mapModelRefs } from "../../types/canonical-type.js";
import type { EngineConfig } from "../../types/config.js";
import { isJsonObject } from "../../types/json.js";
import type { EmissionPlan } from "../../types/model.js";
import type { DocumentFetcher, SchemaDocumentInput } from "../../types/schema-node.js";
import { loadEngineConfig } from "../../utils/config-loader.js";
import { DiagnosticLog } from "../../utils/diagnostics.js";
import { PassFailedError } from "../../utils/errors.js";
import { createLogger, logger as defaultLogger, type Logger } from "../../utils/logger.js";
import { documentStem } from "../../utils/naming.js";
import { appendPointer, ROOT_POINTER } from "../../utils/pointer.js";
import { DocumentSet } from "../loader/index.js";
import { CombinatorMerger } from "../merger/index.js";
import { ModelRegistry } from "../registry/index.js";
import { ReferenceResolver } from "../resolver/index.js";
import { TypeSynthesizer } from "../synthesizer/index.js";

/** Root keywords that make a document root a schema of its own */
const ROOT_SCHEMA_KEYWORDS = [
  "type",
  "properties",
  "items",
  "prefixItems",
  "allOf",
  "oneOf",
  "anyOf",
  "$ref",
  "$dynamicRef",
  "enum",
  "const",
  "additionalProperties",
  "patternProperties",
  "required",
  "format",
];

/**
 * Logger for one pass. A `logLevel` option sets the level of an injected
 * logger, or of a logger private to the pass; the shared default is never
 * touched.
 */
function passLogger(options: PassOptions): Logger {
  const level = options.config?.logLevel;
  if (options.logger) {
    if (level) {
      options.logger.setLevel(level);
    }
    return options.logger;
  }
  return level ? createLogger({ level }) : defaultLogger;
}

export interface PassOptions {
  config?: Partial<EngineConfig>;
  fetch?: DocumentFetcher;
  logger?: Logger;
}

export class ModelSynthesisPass {
  readonly config: EngineConfig;
  readonly documents: DocumentSet;
  readonly resolver: ReferenceResolver;
  readonly registry: ModelRegistry;
  readonly diagnostics: DiagnosticLog;
  private readonly merger: CombinatorMerger;
  private readonly synthesizer: TypeSynthesizer;
  readonly log: Logger;
  private plan?: EmissionPlan;

  constructor(inputs: SchemaDocumentInput[], options: PassOptions = {}) {
    this.log = passLogger(options);
    this.config = loadEngineConfig(options.config, {}, this.log);
    this.diagnostics = new DiagnosticLog(this.log);
    this.documents = new DocumentSet(inputs, options.fetch, this.log);
    this.resolver = new ReferenceResolver(this.documents, this.log);
    this.registry = new ModelRegistry(this.config, this.log);
    this.merger = new CombinatorMerger(
      this.documents,
      this.resolver,
      this.config,
      this.diagnostics,
      this.log,
    );
    this.synthesizer = new TypeSynthesizer(
      this.documents,
      this.resolver,
      this.merger,
      this.registry,
      this.config,
      this.diagnostics,
      this.log,
    );
  }

  /**
   * Walk every input document, finalize the registry and build the plan.
   * Runs once; later calls return the same plan.
   *
   * @throws PassFailedError when any fatal diagnostic was recorded
   */
  run(): EmissionPlan {
    if (this.plan) {
      return this.plan;
    }
    const inputIds = this.documents.ids();
    this.log.info("Model synthesis started", { documents: inputIds.length });

    const roots = new Map<string, CanonicalType>();
    for (const documentId of inputIds) {
      this.walkDefinitions(documentId);
      if (this.isSchemaRoot(documentId)) {
        roots.set(
          documentId,
          this.synthesizer.synthesizeDefinition(documentId, ROOT_POINTER, {
            source: "document",
            name: documentStem(documentId),
          }),
        );
      }
    }

    const finalized = this.registry.finalize();
    for (const error of finalized.errors) {
      this.diagnostics.reportError(error, "fatal");
    }
    if (this.diagnostics.hasFatal()) {
      throw new PassFailedError(this.diagnostics.all());
    }

    const canonicalRoots = new Map<string, CanonicalType>();
    for (const [documentId, type] of roots) {
      canonicalRoots.set(
        documentId,
        mapModelRefs(type, (id) => this.registry.canonical(id)),
      );
    }

    this.plan = {
      order: finalized.order,
      models: finalized.models,
      graph: finalized.graph,
      forwardReferences: finalized.forwardReferences,
      roots: canonicalRoots,
      diagnostics: this.diagnostics.all(),
    };
    this.log.info("Model synthesis complete", {
      models: finalized.order.length,
      diagnostics: this.plan.diagnostics.length,
      cache: this.resolver.stats(),
    });
    return this.plan;
  }

  private walkDefinitions(documentId: string): void {
    for (const collection of this.config.definitionCollections) {
      const entries = this.documents.rawAt(documentId, collection);
      if (!isJsonObject(entries)) {
        continue;
      }
      for (const name of Object.keys(entries)) {
        this.synthesizer.synthesizeDefinition(documentId, appendPointer(collection, name), {
          source: "definition",
          name,
        });
      }
    }
  }

  private isSchemaRoot(documentId: string): boolean {
    const root = this.documents.root(documentId);
    if (typeof root === "boolean") {
      return true;
    }
    if (!isJsonObject(root) || root.openapi !== undefined || root.swagger !== undefined) {
      return false;
    }
    return ROOT_SCHEMA_KEYWORDS.some((keyword) => root[keyword] !== undefined);
  }
}

/**
 * One-shot helper: run a pass over `inputs` and return its plan
 */
export function synthesizeModels(
  inputs: SchemaDocumentInput[],
  options: PassOptions = {},
): EmissionPlan {
  return new ModelSynthesisPass(inputs, options).run();
}
