/**
 * Augmented environment for execa calls.
 *
 * Agents and git are often installed through Homebrew or Nix, whose bin
 * directories are missing from PATH when pluribus runs from a non-login shell.
 */

const extraDirs = [
  '/opt/homebrew/bin',
  '/usr/local/bin',
];

const home = process.env.HOME ?? '';
if (home) {
  extraDirs.push(`${home}/.nix-profile/bin`, `${home}/.local/bin`);
}

const augmentedPath = [...extraDirs, process.env.PATH].filter(Boolean).join(':');

export const execaEnv = {
  env: { PATH: augmentedPath },
};
