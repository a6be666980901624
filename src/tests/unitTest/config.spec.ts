import { loadRuntimeConfig } from '../../config/config';
import { ConfigurationError } from '../../core/utils/errors';

describe('loadRuntimeConfig', () => {
  it('applique les valeurs par défaut', () => {
    expect(loadRuntimeConfig({}, false)).toEqual({
      LOG_LEVEL: 'info',
      JIRA_BATCH_SIZE: 100,
      JIRA_RETRY_ATTEMPTS: 5,
      JIRA_RETRY_BASE_DELAY_S: 45,
      AUDIT_ENABLED: false,
      AUDIT_LOG_FILE: 'logs/audit.log',
    });
  });

  it('convertit les variables fournies et ignore les valeurs vides', () => {
    const config = loadRuntimeConfig(
      {
        LOG_LEVEL: 'debug',
        JIRA_BATCH_SIZE: '50',
        JIRA_RETRY_BASE_DELAY_S: '0.5',
        JIRA_REQUEST_TIMEOUT_MS: '',
        AUDIT_ENABLED: 'true',
        AUDIT_HMAC_KEY: 'test-secret',
        HOME: '/home/test',
      },
      false,
    );

    expect(config.LOG_LEVEL).toBe('debug');
    expect(config.JIRA_BATCH_SIZE).toBe(50);
    expect(config.JIRA_RETRY_BASE_DELAY_S).toBe(0.5);
    expect(config.JIRA_REQUEST_TIMEOUT_MS).toBeUndefined();
    expect(config.AUDIT_ENABLED).toBe(true);
    expect(config.AUDIT_HMAC_KEY).toBe('test-secret');
  });

  it('lève ConfigurationError sur une valeur invalide', () => {
    expect(() => loadRuntimeConfig({ JIRA_BATCH_SIZE: '0' }, false)).toThrow(ConfigurationError);
    expect(() => loadRuntimeConfig({ LOG_LEVEL: 'verbose' }, false)).toThrow(/^Configuration invalide : LOG_LEVEL/);
    expect(() => loadRuntimeConfig({ AUDIT_ENABLED: 'yes' }, false)).toThrow(ConfigurationError);
  });
});
