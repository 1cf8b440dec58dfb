import fs from 'fs/promises';
import path from 'path';
import { BenchmarkConfig, instanceCountFor } from './config';
import { Logger, logger } from './logger';
import { CommandResult, CommandRunner } from './tools';

const HEADER = '# Generated by netbench from config.json. Do not edit: the next run overwrites this file.\n';

export interface TerraformOptions {
  // where the reusable vpc/security_group/ec2 modules live
  modulesDir: string;
  // region -> AMI id; an empty id lets the ec2 module look up Amazon Linux 2 itself
  amiIds?: Record<string, string>;
  // OpenSSH public key registered as `ssh_key_name`; empty means the key pair already exists
  publicKey?: string;
}

export function regionId(region: string): string {
  return region.replace(/-/g, '_');
}

function hclString(value: string): string {
  return JSON.stringify(value)
    .replace(/\$\{/g, () => '$${')
    .replace(/%\{/g, '%%{');
}

function hclMap(entries: string[][], indent = '    '): string {
  if (entries.length === 0) return '{}';
  const width = Math.max(...entries.map(([key]) => hclString(key).length));
  const lines = entries.map(([key, value]) => `${indent}${hclString(key).padEnd(width)} = ${value}`);
  return `{\n${lines.join('\n')}\n${indent.slice(2)}}`;
}

function renderProvider(regions: string[]): string {
  const providers = regions.map(
    (region) => `provider "aws" {\n  alias  = "${regionId(region)}"\n  region = ${hclString(region)}\n}\n`
  );
  return `${HEADER}
terraform {
  required_version = ">= 1.0.0"

  required_providers {
    aws = {
      source  = "hashicorp/aws"
      version = "~> 5.0"
    }
  }
}

${providers.join('\n')}`;
}

function variable(name: string, type: string, defaultValue: string, description: string): string {
  return `variable "${name}" {\n  description = ${hclString(description)}\n  type        = ${type}\n  default     = ${defaultValue}\n}\n`;
}

function renderVariables(config: BenchmarkConfig, options: TerraformOptions): string {
  const regions = config.aws_regions;
  const amiIds = options.amiIds ?? {};
  return [
    HEADER,
    variable('aws_regions', 'list(string)', `[${regions.map(hclString).join(', ')}]`, 'Regions to deploy into'),
    variable('instance_type', 'string', hclString(config.instance_type), 'EC2 instance type for every benchmark host'),
    variable(
      'ami_ids',
      'map(string)',
      hclMap(regions.map((region) => [region, hclString(amiIds[region] ?? '')])),
      'AMI per region; empty selects the latest Amazon Linux 2'
    ),
    variable('key_name', 'string', hclString(config.ssh_key_name), 'EC2 key pair name'),
    variable('public_key', 'string', hclString(options.publicKey ?? ''), 'Public key to register as key_name, if any'),
    variable(
      'vpc_cidr_blocks',
      'map(string)',
      hclMap(regions.map((region, i) => [region, hclString(`10.${i}.0.0/16`)])),
      'VPC CIDR block per region'
    ),
    variable(
      'subnet_cidr_blocks',
      'map(string)',
      hclMap(regions.map((region, i) => [region, hclString(`10.${i}.1.0/24`)])),
      'Public subnet CIDR block per region'
    ),
    variable(
      'instance_counts',
      'map(number)',
      hclMap(regions.map((region) => [region, String(instanceCountFor(config, region))])),
      'Number of benchmark hosts per region'
    ),
    variable(
      'project_tags',
      'map(string)',
      hclMap([
        ['Project', hclString(config.project_tag)],
        ['ManagedBy', hclString('netbench')],
      ]),
      'Tags applied to every resource'
    ),
  ].join('\n');
}

function renderMain(regions: string[], modulesSource: string): string {
  const blocks = regions.map((region) => {
    const id = regionId(region);
    const key = hclString(region);
    return `# ${region}
module "vpc_${id}" {
  source    = "${modulesSource}/vpc"
  providers = { aws = aws.${id} }

  name_prefix       = "netbench-${region}"
  vpc_cidr_block    = var.vpc_cidr_blocks[${key}]
  subnet_cidr_block = var.subnet_cidr_blocks[${key}]
  tags              = var.project_tags
}

module "security_group_${id}" {
  source    = "${modulesSource}/security_group"
  providers = { aws = aws.${id} }

  name_prefix = "netbench-${region}"
  vpc_id      = module.vpc_${id}.vpc_id
  tags        = var.project_tags
}

module "ec2_${id}" {
  source    = "${modulesSource}/ec2"
  providers = { aws = aws.${id} }

  name_prefix       = "netbench-${region}"
  ami_id            = var.ami_ids[${key}]
  instance_type     = var.instance_type
  instance_count    = var.instance_counts[${key}]
  key_name          = var.key_name
  public_key        = var.public_key
  subnet_id         = module.vpc_${id}.subnet_id
  security_group_id = module.security_group_${id}.security_group_id
  tags              = var.project_tags
}
`;
  });
  return `${HEADER}\n${blocks.join('\n')}`;
}

function renderOutputs(regions: string[]): string {
  const output = (name: string, module: string, attribute: string, description: string) =>
    `output "${name}" {\n  description = ${hclString(description)}\n  value = ${hclMap(
      regions.map((region) => [region, `module.${module}_${regionId(region)}.${attribute}`]),
      '    '
    )}\n}\n`;
  return [
    HEADER,
    output('vpc_ids', 'vpc', 'vpc_id', 'VPC id per region'),
    output('subnet_ids', 'vpc', 'subnet_id', 'Subnet id per region'),
    output('instance_public_ips', 'ec2', 'public_ips', 'Public IPs of the benchmark hosts per region'),
    output('instance_private_ips', 'ec2', 'private_ips', 'Private IPs of the benchmark hosts per region'),
    output('instance_ids', 'ec2', 'instance_ids', 'Instance ids per region'),
  ].join('\n');
}

/**
 * Terraform sources for `config`, keyed by file name. `dir` is where they will be written.
 */
export function renderTerraform(config: BenchmarkConfig, dir: string, options: TerraformOptions): Record<string, string> {
  let modulesSource = path.relative(dir, options.modulesDir).split(path.sep).join('/');
  if (!modulesSource.startsWith('.')) modulesSource = `./${modulesSource}`;

  return {
    'provider.tf': renderProvider(config.aws_regions),
    'variables.tf': renderVariables(config, options),
    'main.tf': renderMain(config.aws_regions, modulesSource),
    'outputs.tf': renderOutputs(config.aws_regions),
  };
}

export async function generateTerraform(
  config: BenchmarkConfig,
  dir: string,
  options: TerraformOptions,
  log: Logger = logger
): Promise<string[]> {
  await fs.mkdir(dir, { recursive: true });
  const files = renderTerraform(config, dir, options);
  const written: string[] = [];
  for (const [name, content] of Object.entries(files)) {
    const filePath = path.join(dir, name);
    await fs.writeFile(filePath, content);
    written.push(filePath);
  }
  log.success(`Terraform configuration for ${config.aws_regions.join(', ')} written to ${dir}`);
  return written;
}

export class TerraformRunner {
  constructor(
    private readonly runner: CommandRunner,
    private readonly dir: string,
    private readonly log: Logger = logger,
    private readonly env?: Record<string, string | undefined>
  ) {}

  private exec(args: string[]): Promise<CommandResult> {
    return this.runner.run('terraform', args, {
      cwd: this.dir,
      env: this.env,
      onLine: (line) => this.log.output(line),
    });
  }

  async init(): Promise<void> {
    this.log.info('Initializing Terraform');
    await this.exec(['init', '-input=false', '-no-color']);
  }

  async apply(): Promise<void> {
    this.log.info('Applying Terraform configuration');
    await this.exec(['apply', '-auto-approve', '-input=false', '-no-color']);
  }

  async destroy(): Promise<void> {
    this.log.info('Destroying Terraform resources');
    await this.exec(['destroy', '-auto-approve', '-input=false', '-no-color']);
  }

  async output(): Promise<unknown> {
    const { stdout } = await this.runner.run('terraform', ['output', '-json'], { cwd: this.dir, env: this.env });
    return JSON.parse(stdout);
  }
}
