import { IDependencyValidator } from '../interfaces/DependencyValidator';
import { ILayerRegistry } from '../interfaces/LayerRegistry';
import { layerRegistry } from '../registry/LayerRegistry';
import { DeclaredReference } from '../types';
import { ErrorHandler } from '../utils/error-handler';
import { Logger } from '../utils/logger';
import { DependencyValidator } from '../validation/DependencyValidator';
import { formatReport } from '../validation/report';

export interface CommandResult {
  exitCode: number;
  stdout: string[];
  stderr: string[];
}

const cliLogger = new Logger('scheme-layers');

const ok = (stdout: string[] = []): CommandResult => ({ exitCode: 0, stdout, stderr: [] });
const failed = (stderr: string[]): CommandResult => ({ exitCode: 1, stdout: [], stderr });

export function listLayers(registry: ILayerRegistry = layerRegistry): CommandResult {
  return ok(registry.allLayers().map(({ layer, types }) => `Layer ${layer}: ${[...types].join(', ')}`));
}

export function describeLayer(name: string, registry: ILayerRegistry = layerRegistry): CommandResult {
  try {
    return ok([`${name}: layer ${registry.layerOf(name)}`]);
  } catch (error) {
    if (!ErrorHandler.isLayeringError(error)) throw error;
    return failed([ErrorHandler.formatError(error)]);
  }
}

// Silent on success; one line per violation otherwise
export function checkReferences(
  declared: readonly DeclaredReference[],
  validator: IDependencyValidator = new DependencyValidator()
): CommandResult {
  const report = validator.validate(validator.buildEagerGraph(declared));
  return report.length === 0 ? ok() : failed(formatReport(report));
}

export function auditReferences(
  declared: readonly DeclaredReference[],
  validator: IDependencyValidator = new DependencyValidator()
): CommandResult {
  const advice = validator.auditDeferrals(declared);
  const deferred = declared.filter(ref => ref.kind === 'deferred').length;
  return ok([
    ...advice.map(a => `${a.kind}: ${a.message}`),
    `${deferred} deferred reference(s), ${advice.length} advisory note(s)`
  ]);
}

// stdout lines go out plain so they can be piped; failures go through the logger
export function printResult(result: CommandResult, logger: Logger = cliLogger): number {
  result.stdout.forEach(line => console.log(line));
  result.stderr.forEach(line => logger.error(line));
  return result.exitCode;
}
