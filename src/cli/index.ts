#!/usr/bin/env node

/**
 * Creative Orchestrator — Command Line Interface
 *
 * Operator tooling for policy documents.
 *
 * @module cli
 * @version 1.0.0
 */

import { Command } from 'commander';
import { registerPolicyCommand } from './commands/policy.js';

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM SETUP
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('creative-orchestrator')
  .description('Policy-driven orchestration for generation backends')
  .version('1.0.0');

registerPolicyCommand(program);

program.parse(process.argv);
