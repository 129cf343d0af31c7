import { Command } from 'commander';
import {
  ServiceDispatcher,
  ServiceRegistry,
  buildServiceArgsJsonSchema,
  createLogger,
  describeServiceForm,
  readServiceDefinitionFiles,
  type FieldWidget,
  type Logger,
  type ServiceDefinitionFile,
  type ServiceHandler,
  type ServiceSpec
} from '@terrarium/service-engine';

import { loadCliConfig, splitPathList } from './config';

type GlobalOptions = {
  definitions: string[];
  logLevel?: string;
  json?: boolean;
};

type Env = Record<string, string | undefined>;

export type CliDependencies = {
  env?: Env;
  logger?: Logger;
  /** Handler bound to each service for `call`; defaults to echoing the validated arguments. */
  handlerFor?: (spec: ServiceSpec) => ServiceHandler;
};

type Settings = {
  definitionPaths: string[];
  callTimeoutMs?: number;
  json: boolean;
  logger: Logger;
};

const echoHandler: ServiceHandler = (args) => ({ ...args });

function formatOutput(payload: unknown): void {
  console.log(JSON.stringify(payload, null, 2));
}

function formatWidget(widget: FieldWidget): string {
  const flags: string[] = [widget.widget];
  if (widget.required) {
    flags.push('required');
  }
  if (widget.default !== undefined) {
    flags.push(`default ${String(widget.default)}`);
  }

  const constraints: string[] = [];
  if (widget.min !== undefined) {
    constraints.push(`min ${widget.min}`);
  }
  if (widget.max !== undefined) {
    constraints.push(`max ${widget.max}`);
  }
  if (widget.step !== undefined) {
    constraints.push(`step ${widget.step}`);
  }
  if (widget.unit !== undefined) {
    constraints.push(`unit ${widget.unit}`);
  }
  if (widget.options) {
    constraints.push(`options ${widget.options.join(', ')}`);
  }

  let line = `  ${widget.field} (${flags.join(', ')})`;
  if (widget.description) {
    line += ` ${widget.description}`;
  }
  if (constraints.length > 0) {
    line += ` [${constraints.join(', ')}]`;
  }
  return line;
}

function parseAssignments(assignments: string[]): Record<string, string> {
  const values: Record<string, string> = {};
  for (const assignment of assignments) {
    const separator = assignment.indexOf('=');
    if (separator <= 0) {
      throw new Error(`Expected key=value, received '${assignment}'`);
    }
    values[assignment.slice(0, separator)] = assignment.slice(separator + 1);
  }
  return values;
}

function parseArgsJson(raw: string | undefined): Record<string, unknown> {
  if (!raw) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to parse --args JSON: ${message}`);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('--args must be a JSON object');
  }
  return { ...parsed };
}

function parseTimeout(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Timeout must be a positive number of milliseconds, received '${value}'`);
  }
  return parsed;
}

async function loadSpecs(settings: Settings): Promise<{ specs: ServiceSpec[]; files: ServiceDefinitionFile[] }> {
  const files = await readServiceDefinitionFiles(settings.definitionPaths);
  for (const file of files) {
    for (const error of file.errors) {
      settings.logger.warn(
        { path: file.path, serviceId: error.serviceId, code: error.code },
        `Skipping service definition: ${error.message}`
      );
    }
  }
  return { specs: files.flatMap((file) => file.specs), files };
}

function findSpec(specs: ServiceSpec[], serviceId: string): ServiceSpec {
  const spec = specs.find((candidate) => candidate.id === serviceId);
  if (!spec) {
    throw new Error(`Service '${serviceId}' is not defined`);
  }
  return spec;
}

async function handleList(settings: Settings): Promise<void> {
  const { specs } = await loadSpecs(settings);
  if (settings.json) {
    formatOutput(
      specs.map((spec) => ({
        id: spec.id,
        name: spec.displayName,
        description: spec.description,
        fields: Object.keys(spec.fields)
      }))
    );
    return;
  }
  for (const spec of specs) {
    console.log(`${spec.id}\t${spec.displayName}`);
  }
}

async function handleDescribe(settings: Settings, serviceId: string, jsonSchema: boolean): Promise<void> {
  const { specs } = await loadSpecs(settings);
  const spec = findSpec(specs, serviceId);

  if (jsonSchema) {
    formatOutput(buildServiceArgsJsonSchema(spec));
    return;
  }
  const form = describeServiceForm(spec);
  if (settings.json) {
    formatOutput(form);
    return;
  }
  console.log(`${form.serviceId}: ${form.title}`);
  if (form.description) {
    console.log(`  ${form.description}`);
  }
  for (const widget of form.fields) {
    console.log(formatWidget(widget));
  }
}

async function handleCheck(settings: Settings): Promise<void> {
  const files = await readServiceDefinitionFiles(settings.definitionPaths);
  let loaded = 0;
  let failed = 0;
  for (const file of files) {
    loaded += file.specs.length;
    failed += file.errors.length;
    for (const error of file.errors) {
      console.log(`${file.path}: [${error.code}] ${error.message}`);
    }
  }
  console.log(`Loaded ${loaded} service(s) from ${files.length} file(s)`);
  if (failed > 0) {
    throw new Error(`${failed} service definition(s) failed to load`);
  }
}

async function handleCall(
  settings: Settings,
  handlerFor: (spec: ServiceSpec) => ServiceHandler,
  serviceId: string,
  assignments: string[],
  cmdOptions: { args?: string; timeout?: number }
): Promise<void> {
  const { specs } = await loadSpecs(settings);
  const registry = new ServiceRegistry({ logger: settings.logger });
  for (const spec of specs) {
    registry.register(spec, handlerFor(spec));
  }
  const dispatcher = new ServiceDispatcher({
    registry,
    logger: settings.logger,
    defaultTimeoutMs: settings.callTimeoutMs
  });

  const rawArgs = { ...parseArgsJson(cmdOptions.args), ...parseAssignments(assignments) };
  try {
    const result = await dispatcher.call(serviceId, rawArgs, { timeoutMs: cmdOptions.timeout });
    if (!result.ok) {
      throw result.error;
    }
    formatOutput(result.value ?? null);
  } finally {
    registry.dispose();
  }
}

export function createProgram(deps: CliDependencies = {}): Command {
  const handlerFor = deps.handlerFor ?? (() => echoHandler);
  const program = new Command();
  program
    .name('terrarium-services')
    .description('Inspect service definitions and dry-run service calls')
    .option(
      '--definitions <paths>',
      'Definition file(s), comma separated; repeatable (overrides SERVICE_DEFINITIONS)',
      (value: string, previous: string[]) => [...previous, ...splitPathList(value)],
      []
    )
    .option('--log-level <level>', 'Log level for diagnostics written to stderr (overrides SERVICE_LOG_LEVEL)')
    .option('--json', 'Output JSON');

  const resolveSettings = (): Settings => {
    const options = program.opts<GlobalOptions>();
    const config = loadCliConfig({
      ...(deps.env ?? process.env),
      ...(options.logLevel ? { SERVICE_LOG_LEVEL: options.logLevel } : {})
    });
    const logger =
      deps.logger ??
      createLogger({ level: config.logLevel, name: 'terrarium-services', destination: process.stderr });
    return {
      definitionPaths: options.definitions.length > 0 ? options.definitions : config.definitionPaths,
      callTimeoutMs: config.callTimeoutMs,
      json: Boolean(options.json),
      logger
    };
  };

  program
    .command('list')
    .description('List the services the definition files declare')
    .action(async () => {
      await handleList(resolveSettings());
    });

  program
    .command('describe')
    .description('Show the input form of a service')
    .argument('<serviceId>', 'Service identifier')
    .option('--json-schema', 'Print the JSON Schema of the call arguments', false)
    .action(async (serviceId: string, cmdOptions: { jsonSchema?: boolean }) => {
      await handleDescribe(resolveSettings(), serviceId, Boolean(cmdOptions.jsonSchema));
    });

  program
    .command('check')
    .description('Validate the definition files and report every rejected service')
    .action(async () => {
      await handleCheck(resolveSettings());
    });

  program
    .command('call')
    .description('Validate arguments and dispatch a call to the bound handler')
    .argument('<serviceId>', 'Service identifier')
    .argument('[assignments...]', 'Arguments as key=value pairs')
    .option('--args <json>', 'Arguments as a JSON object; key=value pairs take precedence')
    .option('--timeout <ms>', 'Call timeout in milliseconds (overrides SERVICE_CALL_TIMEOUT_MS)', parseTimeout)
    .action(async (serviceId: string, assignments: string[], cmdOptions: { args?: string; timeout?: number }) => {
      await handleCall(resolveSettings(), handlerFor, serviceId, assignments, cmdOptions);
    });

  return program;
}
