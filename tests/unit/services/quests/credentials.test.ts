/**
 * Quest API credentials tests
 */

import { GetSecretValueCommand, SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import { QuestApiCredentialsProvider } from '../../../../src/services/quests/credentials';

describe('QuestApiCredentialsProvider', () => {
  let client: SecretsManagerClient;
  let send: jest.Mock;

  beforeEach(() => {
    client = new SecretsManagerClient({ region: 'us-east-1' });
    send = jest.fn();
    client.send = send;
  });

  it('prefers inline credentials over the secret', async () => {
    const provider = new QuestApiCredentialsProvider({
      inline: { authorization: 'test-authorization', superProperties: '' },
      secretName: 'quest-api',
      client,
    });

    expect(await provider.get()).toEqual({ authorization: 'test-authorization', superProperties: '' });
    expect(send).not.toHaveBeenCalled();
  });

  it('returns empty inline credentials when no secret is named', async () => {
    const provider = new QuestApiCredentialsProvider({
      inline: { authorization: '', superProperties: '' },
      client,
    });

    expect(await provider.get()).toEqual({ authorization: '', superProperties: '' });
    expect(send).not.toHaveBeenCalled();
  });

  it('reads the secret once and caches it', async () => {
    send.mockResolvedValue({
      SecretString: JSON.stringify({
        authorization: 'test-secret-authorization',
        superProperties: 'test-secret-super-properties',
      }),
    });
    const provider = new QuestApiCredentialsProvider({
      inline: { authorization: '', superProperties: '' },
      secretName: 'quest-api',
      client,
    });

    await provider.get();
    const credentials = await provider.get();

    expect(credentials).toEqual({
      authorization: 'test-secret-authorization',
      superProperties: 'test-secret-super-properties',
    });
    expect(send).toHaveBeenCalledTimes(1);
    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(GetSecretValueCommand);
    expect(command.input).toEqual({ SecretId: 'quest-api' });
  });

  it('fails with the secret name when the secret cannot be read', async () => {
    send.mockResolvedValue({ SecretString: 'not json' });
    const provider = new QuestApiCredentialsProvider({
      inline: { authorization: '', superProperties: '' },
      secretName: 'quest-api',
      client,
    });

    await expect(provider.get()).rejects.toThrow('Failed to load quest API credentials from "quest-api"');
  });
});
