import {
  DescribeImagesCommand,
  EC2Client,
  Instance,
  paginateDescribeInstances,
  RebootInstancesCommand,
  StopInstancesCommand,
} from '@aws-sdk/client-ec2';
import { GetCallerIdentityCommand, STSClient } from '@aws-sdk/client-sts';
import { errorMessage } from './errors';
import { Logger, logger } from './logger';

export interface AwsCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
  region?: string;
}

export interface CallerIdentity {
  account: string;
  arn: string;
  userId: string;
}

export interface TaggedInstance {
  instanceId: string;
  region: string;
  name: string | null;
  state: string;
  publicIp: string | null;
  privateIp: string | null;
}

/**
 * The EC2 and STS calls the benchmark makes outside of Terraform.
 */
export interface CloudApi {
  latestAmazonLinuxAmi(region: string): Promise<string | null>;
  findTaggedInstances(region: string, projectTag: string, states: string[]): Promise<TaggedInstance[]>;
  stopInstances(region: string, instanceIds: string[]): Promise<void>;
  rebootInstances(region: string, instanceIds: string[]): Promise<void>;
  callerIdentity(): Promise<CallerIdentity>;
}

export const AMAZON_LINUX_2_PATTERN = 'amzn2-ami-hvm-2.*-x86_64-gp2';

export function credentialsEnv(credentials?: AwsCredentials): Record<string, string> {
  if (!credentials) return {};
  const env: Record<string, string> = {
    AWS_ACCESS_KEY_ID: credentials.accessKeyId,
    AWS_SECRET_ACCESS_KEY: credentials.secretAccessKey,
  };
  if (credentials.sessionToken) env.AWS_SESSION_TOKEN = credentials.sessionToken;
  if (credentials.region) env.AWS_DEFAULT_REGION = credentials.region;
  return env;
}

function toTaggedInstance(region: string, instance: Instance): TaggedInstance | null {
  if (!instance.InstanceId) return null;
  return {
    instanceId: instance.InstanceId,
    region,
    name: instance.Tags?.find((tag) => tag.Key === 'Name')?.Value ?? null,
    state: instance.State?.Name ?? 'unknown',
    publicIp: instance.PublicIpAddress ?? null,
    privateIp: instance.PrivateIpAddress ?? null,
  };
}

export class AwsCloudApi implements CloudApi {
  private clients = new Map<string, EC2Client>();

  constructor(private readonly credentials?: AwsCredentials) {}

  private sdkCredentials() {
    if (!this.credentials) return undefined;
    return {
      accessKeyId: this.credentials.accessKeyId,
      secretAccessKey: this.credentials.secretAccessKey,
      sessionToken: this.credentials.sessionToken,
    };
  }

  private ec2(region: string): EC2Client {
    let client = this.clients.get(region);
    if (!client) {
      client = new EC2Client({ region, credentials: this.sdkCredentials() });
      this.clients.set(region, client);
    }
    return client;
  }

  async latestAmazonLinuxAmi(region: string): Promise<string | null> {
    const { Images = [] } = await this.ec2(region).send(
      new DescribeImagesCommand({
        Owners: ['amazon'],
        Filters: [
          { Name: 'name', Values: [AMAZON_LINUX_2_PATTERN] },
          { Name: 'state', Values: ['available'] },
        ],
      })
    );
    const newest = Images.filter((image) => image.ImageId && image.CreationDate).sort((a, b) =>
      (b.CreationDate ?? '').localeCompare(a.CreationDate ?? '')
    )[0];
    return newest?.ImageId ?? null;
  }

  async findTaggedInstances(region: string, projectTag: string, states: string[]): Promise<TaggedInstance[]> {
    const found: TaggedInstance[] = [];
    const pages = paginateDescribeInstances(
      { client: this.ec2(region) },
      {
        Filters: [
          { Name: 'tag:Project', Values: [projectTag] },
          { Name: 'instance-state-name', Values: states },
        ],
      }
    );
    for await (const page of pages) {
      for (const reservation of page.Reservations ?? []) {
        for (const instance of reservation.Instances ?? []) {
          const tagged = toTaggedInstance(region, instance);
          if (tagged) found.push(tagged);
        }
      }
    }
    return found;
  }

  async stopInstances(region: string, instanceIds: string[]): Promise<void> {
    await this.ec2(region).send(new StopInstancesCommand({ InstanceIds: instanceIds }));
  }

  async rebootInstances(region: string, instanceIds: string[]): Promise<void> {
    await this.ec2(region).send(new RebootInstancesCommand({ InstanceIds: instanceIds }));
  }

  async callerIdentity(): Promise<CallerIdentity> {
    const sts = new STSClient({
      region: this.credentials?.region ?? process.env.AWS_DEFAULT_REGION ?? 'us-east-1',
      credentials: this.sdkCredentials(),
    });
    const identity = await sts.send(new GetCallerIdentityCommand({}));
    return {
      account: identity.Account ?? '',
      arn: identity.Arn ?? '',
      userId: identity.UserId ?? '',
    };
  }
}

/**
 * AMI per region: configured ids first, then the newest Amazon Linux 2 image.
 * A failed lookup leaves the region empty for the ec2 module to resolve.
 */
export async function resolveAmiIds(
  api: CloudApi,
  regions: string[],
  configured: Record<string, string>,
  log: Logger = logger
): Promise<Record<string, string>> {
  const amiIds: Record<string, string> = {};
  for (const region of regions) {
    if (configured[region]) {
      amiIds[region] = configured[region];
      continue;
    }
    try {
      amiIds[region] = (await api.latestAmazonLinuxAmi(region)) ?? '';
    } catch (error) {
      log.warn(`AMI lookup in ${region} failed, leaving it to Terraform: ${errorMessage(error)}`);
      amiIds[region] = '';
    }
    log.debug(`AMI for ${region}: ${amiIds[region] || '(terraform lookup)'}`);
  }
  return amiIds;
}

export async function verifyCredentials(api: CloudApi, log: Logger = logger): Promise<CallerIdentity> {
  const identity = await api.callerIdentity();
  log.success(`AWS credentials valid for account ${identity.account} (${identity.arn})`);
  return identity;
}
