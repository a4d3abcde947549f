import * as fs from 'fs-extra';
import * as path from 'path';
import Ajv, { JSONSchemaType } from 'ajv';
import { ErrorKind, RcaError, errorMessage } from '../errors';
import { Logger, createLogger } from '../logging/Logger';

export interface TemplateDescriptor {
  id: string;
  name: string;
  description: string;
  /** Template body, relative to `<promptsDir>/templates`. */
  file: string;
  /** Domain context files under `<promptsDir>/contexts`. */
  contexts?: string[];
  /** Response-format instructions under `<promptsDir>/formats`. */
  formatInstructions?: string;
}

export interface PromptContext {
  name: string;
  text: string;
}

export interface PromptTemplate {
  id: string;
  name: string;
  description: string;
  body: string;
  contexts: PromptContext[];
  formatInstructions: string | null;
}

interface Manifest {
  templates: TemplateDescriptor[];
}

const manifestSchema: JSONSchemaType<Manifest> = {
  type: 'object',
  properties: {
    templates: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          id: { type: 'string', minLength: 1 },
          name: { type: 'string' },
          description: { type: 'string' },
          file: { type: 'string', minLength: 1 },
          contexts: { type: 'array', items: { type: 'string' }, nullable: true },
          formatInstructions: { type: 'string', nullable: true }
        },
        required: ['id', 'name', 'description', 'file']
      }
    }
  },
  required: ['templates']
};

const ajv = new Ajv({ allErrors: true });
const validateManifest = ajv.compile(manifestSchema);

/**
 * Loads analysis templates described by `prompts/manifest.json`. Bodies and
 * contexts are plain markdown; loaded templates are cached per id.
 */
export class TemplateManager {
  private manifest: Manifest | null = null;
  private cache = new Map<string, PromptTemplate>();
  private logger: Logger;

  constructor(
    private promptsDir: string,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('Templates');
  }

  async list(): Promise<TemplateDescriptor[]> {
    const manifest = await this.readManifest();
    return manifest.templates;
  }

  async load(templateId: string): Promise<PromptTemplate> {
    const cached = this.cache.get(templateId);
    if (cached) return cached;

    const manifest = await this.readManifest();
    const descriptor = manifest.templates.find((t) => t.id === templateId);
    if (!descriptor) {
      const known = manifest.templates.map((t) => t.id).join(', ');
      throw new RcaError(ErrorKind.ConfigurationError, `Template ${templateId} not found (available: ${known})`);
    }

    const body = await this.readPart('templates', descriptor.file);
    const contexts: PromptContext[] = [];
    for (const name of descriptor.contexts ?? []) {
      contexts.push({ name: path.parse(name).name, text: await this.readPart('contexts', name) });
    }
    const formatInstructions = descriptor.formatInstructions
      ? await this.readPart('formats', descriptor.formatInstructions)
      : null;

    const template: PromptTemplate = {
      id: descriptor.id,
      name: descriptor.name,
      description: descriptor.description,
      body,
      contexts,
      formatInstructions
    };
    this.cache.set(templateId, template);
    this.logger.debug(`Loaded template ${templateId}`, { contexts: contexts.length });
    return template;
  }

  private async readManifest(): Promise<Manifest> {
    if (this.manifest) return this.manifest;

    const manifestPath = path.join(this.promptsDir, 'manifest.json');
    if (!(await fs.pathExists(manifestPath))) {
      throw new RcaError(ErrorKind.ConfigurationError, `Template manifest ${manifestPath} not found`);
    }

    let content: unknown;
    try {
      content = await fs.readJSON(manifestPath);
    } catch (error) {
      throw new RcaError(ErrorKind.ConfigurationError, `Template manifest ${manifestPath} is not valid JSON: ${errorMessage(error)}`, {
        cause: error
      });
    }
    if (!validateManifest(content)) {
      const details = (validateManifest.errors ?? []).map((e) => `${e.instancePath || '/'} ${e.message ?? ''}`).join('; ');
      throw new RcaError(ErrorKind.ConfigurationError, `Template manifest ${manifestPath} is invalid: ${details}`);
    }

    this.manifest = content;
    return content;
  }

  private async readPart(folder: string, file: string): Promise<string> {
    const filePath = path.join(this.promptsDir, folder, file);
    if (!(await fs.pathExists(filePath))) {
      throw new RcaError(ErrorKind.ConfigurationError, `Template file ${filePath} not found`);
    }
    return fs.readFile(filePath, 'utf-8');
  }
}
