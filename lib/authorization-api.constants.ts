export const AUTHORIZATION_API_OPTIONS = 'AUTHORIZATION_API_OPTIONS';
