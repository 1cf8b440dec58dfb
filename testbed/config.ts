import fs from 'fs/promises';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors';

const regionCode = z
  .string()
  .regex(/^[a-z]{2}(-[a-z]+)+-\d+$/, { message: 'is not an AWS region code (for example us-east-1)' });

const positiveInt = z.number().int().positive();

export const configSchema = z
  .object({
    aws_regions: z
      .array(regionCode)
      .min(1, { message: 'must list at least one region' })
      .transform((regions) => [...new Set(regions)]),
    instance_type: z.string().min(1).default('t2.micro'),
    ssh_key_name: z
      .string()
      .regex(/^[\w.-]+$/, { message: 'may only contain letters, digits, dots, dashes and underscores' })
      .default('network-benchmark'),
    create_ssh_key: z.boolean().default(false),
    instance_count: positiveInt.default(1),
    region_instance_counts: z.record(z.string(), positiveInt).default({}),
    ami_ids: z.record(z.string(), z.string().regex(/^ami-[0-9a-f]+$/)).default({}),
    project_tag: z.string().min(1).default('network-benchmark'),
    use_private_ip: z.boolean().default(false),
    test_intra_region: z.boolean().default(false),

    run_latency_tests: z.boolean().default(true),
    ping_count: positiveInt.default(20),

    run_p2p_tests: z.boolean().default(false),
    p2p_duration: positiveInt.default(10),
    p2p_parallel: positiveInt.default(1),

    run_udp_tests: z.boolean().default(false),
    udp_server_region: z
      .string()
      .optional()
      .transform((region) => (region ? region : undefined)),
    udp_bandwidth: z
      .string()
      .regex(/^\d+(\.\d+)?[KMG]?$/, { message: 'must look like 100M or 1G' })
      .default('1G'),
    udp_duration: positiveInt.default(10),

    run_terraform_apply: z.boolean().default(true),
    install_iperf3: z.boolean().default(true),
    run_tests: z.boolean().default(true),
    generate_visualizations: z.boolean().default(true),
    generate_report: z.boolean().default(true),
    cleanup_resources: z.boolean().default(true),
  })
  .superRefine((config, ctx) => {
    if (config.run_udp_tests) {
      if (!config.udp_server_region) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['udp_server_region'],
          message: 'is required when run_udp_tests is enabled',
        });
      } else if (!config.aws_regions.includes(config.udp_server_region)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['udp_server_region'],
          message: `${config.udp_server_region} is not one of aws_regions`,
        });
      }
    }
    for (const region of Object.keys(config.region_instance_counts)) {
      if (!config.aws_regions.includes(region)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['region_instance_counts', region],
          message: `${region} is not one of aws_regions`,
        });
      }
    }
  });

export type BenchmarkConfig = z.output<typeof configSchema>;
export type BenchmarkConfigInput = z.input<typeof configSchema>;

export const DEFAULT_CONFIG: BenchmarkConfig = configSchema.parse({
  aws_regions: ['us-east-1', 'eu-west-2', 'ap-northeast-1'],
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.join('.');
    return where ? `${where} ${issue.message}` : issue.message;
  });
}

export function parseConfig(raw: unknown): BenchmarkConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError('Invalid configuration', formatIssues(result.error));
  }
  return result.data;
}

export async function loadConfig(configPath: string): Promise<BenchmarkConfig> {
  let text: string;
  try {
    text = await fs.readFile(configPath, 'utf8');
  } catch {
    throw new ConfigError(`Configuration file ${configPath} not found`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Configuration file ${configPath} is not valid JSON: ${errorMessage(error)}`);
  }
  return parseConfig(raw);
}

export function instanceCountFor(config: BenchmarkConfig, region: string): number {
  return config.region_instance_counts[region] ?? config.instance_count;
}

export function ipType(config: BenchmarkConfig): 'public' | 'private' {
  return config.use_private_ip ? 'private' : 'public';
}
