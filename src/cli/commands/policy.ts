import { Command } from 'commander';
import * as fs from 'node:fs';
import { EventBus } from '../../kernel/event-bus.js';
import { DEFAULT_POLICY } from '../../policy/defaults.js';
import { parsePolicyDocument, PolicyStore, PolicyValidationError } from '../../policy/policy-store.js';
import type { PolicyDocument } from '../../policy/schemas.js';
import { CircuitBreakerRegistry } from '../../resilience/breaker-registry.js';
import { Router } from '../../routing/router.js';
import { CostModeSchema, type Result, ok, err } from '../../types/index.js';

/**
 * Read and validate a JSON policy document from disk.
 */
export function validatePolicyFile(filePath: string): Result<PolicyDocument, PolicyValidationError> {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(new PolicyValidationError([`${filePath}: ${message}`]));
  }
  return parsePolicyDocument(raw);
}

function loadDocument(file: string | undefined): Result<unknown, PolicyValidationError> {
  if (file === undefined) return ok(DEFAULT_POLICY);
  return validatePolicyFile(file);
}

export function registerPolicyCommand(program: Command): void {
  const policyCmd = program.command('policy').description('Inspect and validate policy documents');

  policyCmd
    .command('validate')
    .description('Validate a JSON policy document')
    .argument('<file>', 'Path to the policy document')
    .action((file: string) => {
      const result = validatePolicyFile(file);
      if (!result.success) {
        console.error(`Policy rejected (${result.error.issues.length} issue${result.error.issues.length === 1 ? '' : 's'}):`);
        for (const issue of result.error.issues) {
          console.error(`  - ${issue}`);
        }
        process.exitCode = 1;
        return;
      }

      const capabilities = Object.keys(result.data.routing.capabilities);
      console.log(`Policy ${result.data.version} is valid`);
      console.log(`  Capabilities: ${capabilities.join(', ')}`);
      console.log(`  Budget scopes: ${result.data.cost.scopes.map((s) => s.id).join(', ') || 'none'}`);
    });

  policyCmd
    .command('defaults')
    .description('Print the built-in default policy document')
    .action(() => {
      console.log(JSON.stringify(DEFAULT_POLICY, null, 2));
    });

  policyCmd
    .command('route')
    .description('Show the candidate order for a capability')
    .argument('<capability>', 'Capability to route, e.g. generate-image')
    .option('-f, --file <file>', 'Policy document (defaults to the built-in policy)')
    .option('-m, --mode <mode>', 'Cost mode: balanced, cost_optimized, quality_optimized')
    .option('-p, --provider <provider>', 'Requested provider')
    .action((capability: string, options: { file?: string; mode?: string; provider?: string }) => {
      const document = loadDocument(options.file);
      if (!document.success) {
        console.error(document.error.message);
        process.exitCode = 1;
        return;
      }

      const mode = CostModeSchema.optional().safeParse(options.mode);
      if (!mode.success) {
        console.error(`Unknown cost mode: ${options.mode}`);
        process.exitCode = 1;
        return;
      }

      const eventBus = new EventBus();
      const snapshot = new PolicyStore(eventBus, document.data).current();
      const router = new Router(new CircuitBreakerRegistry(eventBus));
      const routed = router.candidates(
        capability,
        {
          ...(mode.data !== undefined ? { costMode: mode.data } : {}),
          ...(options.provider !== undefined ? { requestedProvider: options.provider } : {}),
        },
        snapshot,
      );

      if (!routed.success) {
        console.error(routed.error.message);
        process.exitCode = 1;
        return;
      }
      routed.data.forEach((provider, index) => console.log(`${index + 1}. ${provider}`));
    });
}
