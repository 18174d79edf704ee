export * from './encryption/index.js';
export {
  encryptedFieldsPlugin,
  encryptedQueryValues,
  type EncryptedFieldDeclaration,
  type EncryptedFieldsPluginOptions,
  type EncryptedFieldType
} from './database/encrypted-fields.js';
