import * as path from 'path';
import { promises as fs } from 'fs';
import { expandEnvVars, ExtractionConfigService } from '../../config/ExtractionConfigService';
import { ConfigurationError } from '../../core/utils/errors';
import { FileLoader } from '../../core/utils/FileLoader';
import { LocalTransport } from '../../core/utils/transports/LocalTransport';

describe('expandEnvVars', () => {
  it('remplace $VAR et ${VAR}, laisse les variables inconnues', () => {
    expect(expandEnvVars('a $X b ${Y} $UNKNOWN', { X: '1', Y: '2' })).toBe('a 1 b 2 $UNKNOWN');
  });
});

describe('ExtractionConfigService', () => {
  const fixturesDir = path.resolve(__dirname, 'fixtures', 'config');
  const env = { JIRA_TOKEN: 'test-secret' };
  const service = new ExtractionConfigService(new FileLoader([new LocalTransport(fixturesDir)]), env);

  beforeAll(async () => {
    await fs.mkdir(fixturesDir, { recursive: true });
    await fs.writeFile(
      path.join(fixturesDir, 'extractor.ini'),
      ['[source]', 'JIRA_SERVER = https://jira.example.com', 'Jira_Token = $JIRA_TOKEN', 'jql = project = PRJ ORDER BY created ASC', ''].join('\n'),
      'utf-8',
    );
    await fs.writeFile(
      path.join(fixturesDir, 'extractor.json'),
      JSON.stringify({
        source: { jira_server: 'https://old.example.com', jira_token: 'x', jql: 'project = OLD' },
        target: {
          jira_server: 'https://jira.example.com',
          jira_token: '${JIRA_TOKEN}',
          jql: 'project = PRJ',
          client_crt: '/etc/pki/client.crt',
          client_key: '/etc/pki/client.key',
        },
      }),
      'utf-8',
    );
    await fs.writeFile(
      path.join(fixturesDir, 'extractor.xml'),
      '<config><source><jira_server>https://jira.example.com</jira_server><jira_token>${JIRA_TOKEN}</jira_token><jql>project = PRJ</jql></source></config>',
      'utf-8',
    );
    await fs.writeFile(
      path.join(fixturesDir, 'dotted.ini'),
      ['; instances', '[jira.prod]', 'jira_server = https://jira.example.com', 'jira_token = $JIRA_TOKEN', 'jql = summary ~ "#123" ; OR project = PRJ', ''].join('\n'),
      'utf-8',
    );
    await fs.writeFile(path.join(fixturesDir, 'missing.ini'), '[source]\njira_server = https://jira.example.com\njira_token = t\n', 'utf-8');
    await fs.writeFile(
      path.join(fixturesDir, 'halfcert.ini'),
      '[source]\njira_server = https://jira.example.com\njira_token = t\njql = project = PRJ\nclient_crt = /etc/pki/client.crt\n',
      'utf-8',
    );
  });

  it('lit une stanza INI, clés insensibles à la casse et variables développées', async () => {
    await expect(service.loadStanza('extractor.ini', 'source')).resolves.toEqual({
      jira_server: 'https://jira.example.com',
      jira_token: 'test-secret',
      jql: 'project = PRJ ORDER BY created ASC',
    });
  });

  it('garde les stanzas pointées et les valeurs contenant ; ou #', async () => {
    await expect(service.loadStanza('dotted.ini', 'jira.prod')).resolves.toEqual({
      jira_server: 'https://jira.example.com',
      jira_token: 'test-secret',
      jql: 'summary ~ "#123" ; OR project = PRJ',
    });
  });

  it('lit une stanza JSON avec certificat client', async () => {
    await expect(service.loadStanza('extractor.json', 'target')).resolves.toEqual({
      jira_server: 'https://jira.example.com',
      jira_token: 'test-secret',
      jql: 'project = PRJ',
      client_crt: '/etc/pki/client.crt',
      client_key: '/etc/pki/client.key',
    });
  });

  it('lit une stanza XML', async () => {
    await expect(service.loadStanza('extractor.xml', 'source')).resolves.toEqual({
      jira_server: 'https://jira.example.com',
      jira_token: 'test-secret',
      jql: 'project = PRJ',
    });
  });

  it('refuse une stanza inconnue', async () => {
    await expect(service.loadStanza('extractor.ini', 'prod')).rejects.toThrow("Invalid source stanza 'prod' specified for config file 'extractor.ini'");
  });

  it('signale une clé obligatoire manquante', async () => {
    await expect(service.loadStanza('missing.ini', 'source')).rejects.toThrow(/^Missing configuration in stanza source of file missing\.ini: jql/);
  });

  it('exige certificat et clé ensemble', async () => {
    await expect(service.loadStanza('halfcert.ini', 'source')).rejects.toThrow(ConfigurationError);
  });

  it('signale un fichier illisible', async () => {
    await expect(service.loadStanza('nope.ini', 'source')).rejects.toThrow("Configuration file 'nope.ini' could not be read");
  });
});
