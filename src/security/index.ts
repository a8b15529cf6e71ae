export { readServerCredentials, OSSRH_SERVER_ID } from './credentials.js';
