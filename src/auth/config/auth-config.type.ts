export type AuthConfig = {
  secret: string;
  expires: string; // ms duration, e.g. '30m'
};
