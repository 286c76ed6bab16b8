import { ConfigurationError, InvalidOperationError } from './error-log.errors';

export const MAX_APPLICATION_NAME_LENGTH = 60;
export const MAX_SCHEMA_QUALIFIER_LENGTH = 30;

const SCHEMA_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_$]*$/;

/**
 * The (application name, schema qualifier) pair every operation of a log is
 * scoped to. The application name is fixed at construction; the schema
 * qualifier may be set once, and neither may change after `seal()`.
 */
export class ApplicationNamespace {
  readonly applicationName: string;
  private schema = '';
  private schemaInitialized = false;
  private sealed = false;

  constructor(applicationName?: string | null, schemaQualifier?: string | null) {
    const name = applicationName ?? '';
    if (name.length > MAX_APPLICATION_NAME_LENGTH) {
      throw new ConfigurationError(
        `Application name is too long. Maximum length allowed is ${MAX_APPLICATION_NAME_LENGTH} characters.`,
      );
    }
    this.applicationName = name;
    this.setSchemaQualifier(schemaQualifier);
  }

  get schemaQualifier(): string {
    return this.schema;
  }

  /** Empty or missing means "backend default" and leaves the qualifier unset. */
  setSchemaQualifier(value?: string | null) {
    if (this.schemaInitialized) {
      throw new InvalidOperationError('The schema qualifier cannot be reset once initialized.');
    }
    if (this.sealed) {
      throw new InvalidOperationError('The schema qualifier cannot be set after the log has been used.');
    }
    const schema = (value ?? '').trim();
    if (schema.length === 0) return;
    if (schema.length > MAX_SCHEMA_QUALIFIER_LENGTH) {
      throw new ConfigurationError(
        `Schema qualifier is too long. Maximum length allowed is ${MAX_SCHEMA_QUALIFIER_LENGTH} characters.`,
      );
    }
    if (!SCHEMA_IDENTIFIER.test(schema)) {
      throw new ConfigurationError(
        `Schema qualifier "${schema}" must start with a letter or underscore and hold only letters, digits, _ or $.`,
      );
    }
    this.schema = schema;
    this.schemaInitialized = true;
  }

  seal() {
    this.sealed = true;
  }

  /** `schema.table` when a qualifier is set, else the bare table name. */
  qualify(table: string): string {
    return this.schema ? `${this.schema}.${table}` : table;
  }
}
