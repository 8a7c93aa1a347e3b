export enum ActivityAction {
  REGISTER = 'register',
  DEACTIVATE = 'deactivate',
  UPLOAD = 'upload',
  UPLOAD_VERSION = 'upload_version',
  UPDATE = 'update',
  DELETE = 'delete',
  GRANT = 'grant',
  PERMISSION_UPDATE = 'permission_update',
  REVOKE = 'revoke',
}
