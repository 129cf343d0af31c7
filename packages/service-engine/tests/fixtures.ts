import { readFileSync } from 'node:fs';
import path from 'node:path';

import { parseServiceDefinitions, type ServiceSpec } from '../src/index';

export const fixturePath = (name: string): string => path.join(__dirname, 'fixtures', name);

export function loadReptileSpecs(): Record<string, ServiceSpec> {
  const source = fixturePath('reptile-habitat.yaml');
  const { specs, errors } = parseServiceDefinitions(readFileSync(source, 'utf8'), source);
  if (errors.length > 0) {
    throw new Error(`Fixture failed to load: ${errors.map((error) => error.message).join('; ')}`);
  }
  return Object.fromEntries(specs.map((spec) => [spec.id, spec]));
}
