import type { ServiceDefinition } from './index.js';

const GITHUB_USER_PATTERN = /^(https?:\/\/)?((gist\.)?github\.(io|com))\/(?<username>[^/?]+)(\/.+)?(&.+)?/;

/**
 * `github+user:<name>` for a bare username or any github.com,
 * github.io or gist profile link.
 */
export function githubExternalId(username: string): string {
  const match = GITHUB_USER_PATTERN.exec(username);
  const name = match?.groups?.username ?? username;
  return `github+user:${name}`;
}

export const github: ServiceDefinition = {
  name: 'Github',
  urls: ['http://github.com', 'http://gist.github.io', 'http://github.io'],
  externalId: githubExternalId,
};
