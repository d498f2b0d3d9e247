/**
 * Authentication module: SAML assertion consumer and browser launch.
 *
 * @module auth
 */

export { SamlAcsAuthProvider, SAML_USERNAME } from './saml-acs.js';
export type { SamlAcsAuthProviderOptions } from './saml-acs.js';

export { browserCommand, openInBrowser } from './browser.js';
export type { BrowserCommand } from './browser.js';
