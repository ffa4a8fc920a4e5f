// src/cli/commands/models.ts

/**
 * Models command - lists the registry
 */

import type { ModelRegistry } from '../../features/model-registry/registry.js';
import { modelKey } from '../../features/model-registry/types.js';
import type { CliIO } from '../types.js';

export function formatModelTable(registry: Pick<ModelRegistry, 'list' | 'defaultModel'>): string {
  const rows = registry.list().map(spec => {
    const key = modelKey(spec);
    return [
      key === registry.defaultModel ? `${key} *` : key,
      spec.contextWindow.toLocaleString('en-US'),
      `${spec.pricing.inputPricePerMillion}/${spec.pricing.outputPricePerMillion}`,
      spec.supportsTools ? 'yes' : 'no'
    ];
  });

  const header = ['MODEL', 'CONTEXT', 'USD/1M IN/OUT', 'TOOLS'];
  const widths = header.map((title, i) => Math.max(title.length, ...rows.map(row => row[i].length)));
  const line = (cells: string[]) => cells.map((cell, i) => cell.padEnd(widths[i])).join('  ').trimEnd();

  return [line(header), ...rows.map(line)].join('\n');
}

export function modelsCommand(registry: Pick<ModelRegistry, 'list' | 'defaultModel'>, io: CliIO): number {
  io.stdout(formatModelTable(registry));
  return 0;
}
