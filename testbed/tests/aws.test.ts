import { describe, expect, it } from 'vitest';
import { credentialsEnv, resolveAmiIds, verifyCredentials } from '../aws';
import { FakeCloud, memoryLogger } from './helpers';

describe('resolveAmiIds', () => {
  it('prefers configured AMIs and falls back to Terraform when the lookup fails', async () => {
    const cloud = new FakeCloud([], {
      'eu-west-2': 'ami-0eu',
      'ap-northeast-1': new Error('UnauthorizedOperation'),
      'us-west-2': null,
    });
    const { log, sink } = memoryLogger();

    const amis = await resolveAmiIds(
      cloud,
      ['us-east-1', 'eu-west-2', 'ap-northeast-1', 'us-west-2'],
      { 'us-east-1': 'ami-0configured' },
      log
    );

    expect(amis).toEqual({
      'us-east-1': 'ami-0configured',
      'eu-west-2': 'ami-0eu',
      'ap-northeast-1': '',
      'us-west-2': '',
    });
    expect(cloud.amiLookups).toEqual(['eu-west-2', 'ap-northeast-1', 'us-west-2']);
    expect(
      sink.lines.some((line) => line.endsWith('[warn] AMI lookup in ap-northeast-1 failed, leaving it to Terraform: UnauthorizedOperation'))
    ).toBe(true);
  });
});

describe('credentials', () => {
  it('maps credentials onto the AWS environment variables', () => {
    expect(credentialsEnv({ accessKeyId: 'test-key', secretAccessKey: 'test-secret', region: 'eu-west-2' })).toEqual({
      AWS_ACCESS_KEY_ID: 'test-key',
      AWS_SECRET_ACCESS_KEY: 'test-secret',
      AWS_DEFAULT_REGION: 'eu-west-2',
    });
    expect(credentialsEnv()).toEqual({});
  });

  it('reports the caller identity', async () => {
    const { log, sink } = memoryLogger();
    const identity = await verifyCredentials(new FakeCloud(), log);

    expect(identity.account).toBe('123456789012');
    expect(sink.lines.some((line) => line.includes('AWS credentials valid for account 123456789012'))).toBe(true);
  });
});
