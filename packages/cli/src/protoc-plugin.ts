import { create } from '@bufbuild/protobuf';
import {
  CodeGeneratorResponseSchema,
  CodeGeneratorResponse_Feature,
  type CodeGeneratorRequest,
  type CodeGeneratorResponse,
} from '@bufbuild/protobuf/wkt';
import type { Plugin } from '@bufbuild/protoplugin';
import {
  PLUGIN_NAME,
  candidateServices,
  decodeRequest,
  generateFiles,
  loadConfigFileSync,
  parsePluginParameter,
  resolveConfig,
  type FileDescriptor,
  type GeneratorConfig,
} from 'cache-manager-codegen';
import { createLogger, type Logger } from './logger.js';

export const PLUGIN_VERSION = 'v0.1.0';

export interface CacheManagerPluginOptions {
  /** Directory the project config file is searched from; false skips the config file */
  configSearchFrom?: string | false;
  logger?: Logger;
}

/**
 * The protoc plugin: CodeGeneratorRequest in, CodeGeneratorResponse out.
 * Any failure propagates and aborts the whole invocation.
 */
export function createCacheManagerPlugin(options: CacheManagerPluginOptions = {}): Plugin {
  const logger = options.logger ?? createLogger();

  return {
    name: PLUGIN_NAME,
    version: PLUGIN_VERSION,

    run(request: CodeGeneratorRequest): CodeGeneratorResponse {
      try {
        const fileConfig = options.configSearchFrom === false ? {} : loadConfigFileSync(options.configSearchFrom);
        const config = resolveConfig(fileConfig, parsePluginParameter(request.parameter));
        logger.debug({ parameter: request.parameter, config }, 'resolved config');

        const files = decodeRequest(request, config.goImportMap);
        warnStreamingMethods(files, config, logger);

        const generated = generateFiles(files, config);
        for (const file of generated) {
          logger.info({ file: file.name, bytes: file.content.length }, 'generated cache manager');
        }

        return create(CodeGeneratorResponseSchema, {
          supportedFeatures: BigInt(CodeGeneratorResponse_Feature.PROTO3_OPTIONAL),
          file: generated.map(file => ({ name: file.name, content: file.content })),
        });
      } catch (err) {
        logger.error({ err }, 'cache manager generation failed');
        throw err;
      }
    },
  };
}

// ── Helpers ───────────────────────────────────────────────────

function warnStreamingMethods(files: ReadonlyArray<FileDescriptor>, config: GeneratorConfig, logger: Logger): void {
  for (const file of files) {
    if (!file.generate) continue;
    for (const service of candidateServices(file, config)) {
      for (const method of service.methods) {
        if (method.clientStreaming || method.serverStreaming) {
          logger.warn(
            { file: file.name, service: service.name, method: method.name },
            'streaming method wrapped as a unary cache accessor',
          );
        }
      }
    }
  }
}
