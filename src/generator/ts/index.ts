// generator/ts/index.ts
import path from "node:path";
import { SchemaBuilder } from "@/schema/builder";
import { CastTypeResolver } from "@/schema/cast";
import { DataObjectAnalyzer } from "@/schema/data-object";
import { qualifiedName } from "@/schema/definitions";
import { Diagnostics } from "@/schema/diagnostics";
import { ModelDiscovery, type ModuleLoader } from "@/schema/discovery";
import { TypeExtractor } from "@/schema/extractor";
import { ClassRegistry } from "@/schema/registry";
import { RelationshipResolver } from "@/schema/relationship";
import { schemaToJson, type SchemaMap } from "@/schema/types";
import { DEFAULT_SCHEMA_PATH, type GeneratorConfig } from "@/utils/config";
import { writeJson, writeOutput } from "../../writer/writer.js";
import { InterfaceGenerator } from "./generator.js";
import { JSON_LD_RESERVED } from "./json-ld.js";
import { TypeMapper } from "./type-mapper.js";

export interface PipelineOptions {
   /** Base for relative paths in the config. Default: process.cwd(). */
   cwd?: string;
   clock?: () => Date;
   loader?: ModuleLoader;
}

export interface Pipeline {
   registry: ClassRegistry;
   diagnostics: Diagnostics;
   mapper: TypeMapper;
   analyzer: DataObjectAnalyzer;
   discovery: ModelDiscovery;
   builder: SchemaBuilder;
   generator: InterfaceGenerator;
}

/** Wire both pipelines for one run; every piece shares one registry and diagnostics. */
export function createPipeline(config: GeneratorConfig, options: PipelineOptions = {}): Pipeline {
   const registry = new ClassRegistry(config.valueObjectNamespace);
   const diagnostics = new Diagnostics();

   const mapper = new TypeMapper({
      resolveValueObject: (name) => {
         const vo = registry.resolveValueObject(name);
         return vo ? qualifiedName(vo) : undefined;
      },
      reserved: config.withJsonLd ? JSON_LD_RESERVED : undefined,
   });
   const analyzer = new DataObjectAnalyzer(mapper);

   const discovery = new ModelDiscovery(
      registry,
      {
         modelsPath: config.modelsPath,
         additionalModels: config.additionalModels,
         classPaths: config.classPaths,
         exclude: config.exclude,
         cwd: options.cwd,
         loader: options.loader,
      },
      diagnostics,
   );
   const extractor = new TypeExtractor(
      new CastTypeResolver(analyzer, registry, diagnostics),
      new RelationshipResolver(diagnostics),
      { withCounts: config.withCounts, customProps: config.customProps },
   );
   const builder = new SchemaBuilder(discovery, extractor, config.customProps);

   const generator = new InterfaceGenerator(registry, analyzer, mapper, {
      withJsonLd: config.withJsonLd,
      nullableFields: config.nullableFields,
      regenerateCommand: config.regenerateCommand,
      clock: options.clock,
      diagnostics,
   });

   return { registry, diagnostics, mapper, analyzer, discovery, builder, generator };
}

/** Model, class and additional sources a run would read, listed without loading them. */
export function watchedFiles(config: GeneratorConfig, cwd: string = process.cwd()): string[] {
   return createPipeline(config, { cwd }).discovery.sourceFiles();
}

export interface GenerateResult {
   outputPath: string;
   /** Text written to `outputPath`. */
   content: string;
   schema: SchemaMap;
   /** Where the schema JSON went, when `saveSchema` is on. */
   schemaPath?: string;
   diagnostics: Diagnostics;
}

export function schemaOutputPath(config: GeneratorConfig, cwd: string): string | undefined {
   if (config.saveSchema === false) return undefined;
   return path.resolve(cwd, config.saveSchema === true ? DEFAULT_SCHEMA_PATH : config.saveSchema);
}

/** One full run: build the schema, render it, write the file. */
export async function generateTypes(config: GeneratorConfig, options: PipelineOptions = {}): Promise<GenerateResult> {
   const cwd = options.cwd ?? process.cwd();
   const pipeline = createPipeline(config, { ...options, cwd });

   const schema = await pipeline.builder.build();
   const outputPath = path.resolve(cwd, config.outputPath);
   const content = await writeOutput(outputPath, pipeline.generator.generate(schema), {
      prettier: config.prettier,
   });

   const schemaPath = schemaOutputPath(config, cwd);
   if (schemaPath) writeJson(schemaPath, schemaToJson(schema));

   return {
      outputPath,
      content,
      schema,
      schemaPath,
      diagnostics: pipeline.diagnostics,
   };
}
