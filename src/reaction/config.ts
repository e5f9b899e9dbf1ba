export interface MappingConfig {
  /** Hops kept around every reacting-bond path atom before boundary checks. */
  initialRadius: number;
  /** Extra hops grown from an edge atom whose own type changed. */
  selfChangeHops: number;
  /** Extra hops grown from an edge atom with a changed 1st neighbour. */
  firstShellChangeHops: number;
  /** Extra hops grown from an edge atom with a changed 2nd neighbour. */
  secondShellChangeHops: number;
  /** Element symbol per type id, index = type - 1. */
  elementsByType?: readonly string[];
  /** Type ids treated as hydrogen regardless of element. */
  hydrogenTypes?: readonly number[];
  verbose: boolean;
}

export const MAX_SHELL_RADIUS = 3;

export const DEFAULT_MAPPING_CONFIG: Readonly<MappingConfig> = {
  initialRadius: 3,
  selfChangeHops: 3,
  firstShellChangeHops: 2,
  secondShellChangeHops: 1,
  verbose: Boolean(process.env.VERBOSE),
};

function checkHops(name: keyof MappingConfig, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min || value > MAX_SHELL_RADIUS) {
    throw new RangeError(`${name} must be an integer between ${min} and ${MAX_SHELL_RADIUS}, got ${value}`);
  }
}

export function resolveMappingConfig(overrides: Partial<MappingConfig> = {}): MappingConfig {
  const config: MappingConfig = {
    initialRadius: overrides.initialRadius ?? DEFAULT_MAPPING_CONFIG.initialRadius,
    selfChangeHops: overrides.selfChangeHops ?? DEFAULT_MAPPING_CONFIG.selfChangeHops,
    firstShellChangeHops: overrides.firstShellChangeHops ?? DEFAULT_MAPPING_CONFIG.firstShellChangeHops,
    secondShellChangeHops: overrides.secondShellChangeHops ?? DEFAULT_MAPPING_CONFIG.secondShellChangeHops,
    elementsByType: overrides.elementsByType,
    hydrogenTypes: overrides.hydrogenTypes,
    verbose: overrides.verbose ?? DEFAULT_MAPPING_CONFIG.verbose,
  };

  checkHops('initialRadius', config.initialRadius, 1);
  checkHops('selfChangeHops', config.selfChangeHops, 1);
  checkHops('firstShellChangeHops', config.firstShellChangeHops, 1);
  checkHops('secondShellChangeHops', config.secondShellChangeHops, 1);

  return config;
}
