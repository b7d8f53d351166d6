import { describe, it, expect } from 'vitest';
import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

const srcDir = fileURLToPath(new URL('../../', import.meta.url));

// Module specifiers that survive compilation; `import type` / `export type` are erased.
function runtimeSpecifiers(source: string): string[] {
  const statements = source.matchAll(/^(?:import|export)\s+(type\s+)?(?:[^;]*?\sfrom\s+)?'([^']+)'/gms);
  return [...statements].filter((match) => match[1] === undefined).map((match) => match[2] ?? '');
}

async function importGraph(entry: string): Promise<{ modules: Set<string>; packages: Set<string> }> {
  const modules = new Set<string>();
  const packages = new Set<string>();
  const pending = [resolve(srcDir, entry)];

  for (let file = pending.pop(); file !== undefined; file = pending.pop()) {
    if (modules.has(file)) continue;
    modules.add(file);
    for (const specifier of runtimeSpecifiers(await readFile(file, 'utf8'))) {
      if (specifier.startsWith('.')) {
        pending.push(resolve(dirname(file), specifier.replace(/\.js$/, '.ts')));
      } else {
        packages.add(specifier);
      }
    }
  }
  return { modules, packages };
}

const builtins = (packages: Set<string>) => [...packages].filter((name) => name.startsWith('node:')).sort();

describe('edge entry point', () => {
  it('should reach the edge transport and webhook without any Node built-in', async () => {
    const { modules, packages } = await importGraph('edge.ts');

    expect(modules).toContain(resolve(srcDir, 'adapters/edge/EdgeTransport.ts'));
    expect(modules).toContain(resolve(srcDir, 'adapters/webhook/edgeWebhook.ts'));
    expect(modules).toContain(resolve(srcDir, 'core/inputFile.ts'));
    expect(packages).toContain('hono');
    expect(builtins(packages)).toEqual([]);
  });

  it('should still see the built-ins the Node entry point pulls in', async () => {
    const { packages } = await importGraph('index.ts');

    expect(builtins(packages)).toEqual(['node:fs/promises', 'node:http', 'node:https']);
  });
});
