import { z } from 'zod';
import { FileLoader } from '../core/utils/FileLoader';
import { ConfigurationError } from '../core/utils/errors';

const stanzaSchema = z
  .object({
    jira_server: z.string().url(),
    jira_token: z.string().min(1),
    client_crt: z.string().min(1).optional(),
    client_key: z.string().min(1).optional(),
    jql: z.string().trim().min(1),
  })
  .refine((s) => (s.client_crt === undefined) === (s.client_key === undefined), {
    message: 'client_crt et client_key doivent être fournis ensemble',
    path: ['client_crt'],
  });

export type ExtractionStanza = z.infer<typeof stanzaSchema>;

/**
 * Remplace `$VAR` et `${VAR}` par la valeur d'environnement.
 * Une variable inconnue reste telle quelle.
 */
export function expandEnvVars(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(/\$(?:\{(\w+)\}|(\w+))/g, (whole: string, braced: string | undefined, bare: string | undefined) => {
    const name = braced ?? bare ?? '';
    return env[name] ?? whole;
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Lecture d'une stanza (section) du fichier de configuration de l'extracteur.
 * Formats : .ini, .json, .xml ; sources : disque, http(s)://, s3://.
 */
export class ExtractionConfigService {
  constructor(
    private readonly loader: FileLoader,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  /**
   * @throws ConfigurationError fichier illisible, stanza absente ou clé manquante
   */
  public async loadStanza(configFile: string, stanza: string): Promise<ExtractionStanza> {
    let content: unknown;
    try {
      content = (await this.loader.load(configFile)).content;
    } catch (err) {
      throw new ConfigurationError(`Configuration file '${configFile}' could not be read`, { cause: err });
    }

    if (!isRecord(content)) {
      throw new ConfigurationError(`Configuration file '${configFile}' has no stanza`);
    }
    const section = content[stanza];
    if (!isRecord(section)) {
      throw new ConfigurationError(`Invalid source stanza '${stanza}' specified for config file '${configFile}'`);
    }

    const expanded = Object.fromEntries(
      Object.entries(section)
        .filter(([, v]) => v !== undefined && v !== null && typeof v !== 'object')
        .map(([k, v]) => [k.toLowerCase(), expandEnvVars(String(v), this.env)]),
    );

    const parsed = stanzaSchema.safeParse(expanded);
    if (!parsed.success) {
      const details = parsed.error.issues.map((i) => `${i.path.join('.') || '(stanza)'}: ${i.message}`).join('; ');
      throw new ConfigurationError(`Missing configuration in stanza ${stanza} of file ${configFile}: ${details}`);
    }
    return parsed.data;
  }
}
