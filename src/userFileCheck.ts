// src/userFileCheck.ts
// Looks for a file under the logged-on user's profile, e.g.
//   folder "AppData\Local\8x8*"  +  file "8x8*.exe"
// Schedulers key off the exit code, so the mapping below must not change.

import { execFile } from "child_process";
import type { Dirent } from "fs";
import { readdir } from "fs/promises";
import os from "os";
import * as path from "path";
import { promisify } from "util";

const execFileAsync = promisify(execFile);

export type FileCheckOutcome =
  | { status: "found"; profileDir: string; file: string }
  | { status: "not-found"; profileDir: string; folders: string[] }
  | { status: "no-user" }
  | { status: "invalid"; message: string };

export const EXIT_CODES = {
  found: 0,
  "no-user": 0,
  invalid: 1,
  "not-found": 2,
} as const satisfies Record<FileCheckOutcome["status"], number>;

export function exitCodeFor(outcome: FileCheckOutcome): number {
  return EXIT_CODES[outcome.status];
}

/** Resolves the interactive user's profile directory, or null if nobody is logged on. */
export type ProfileResolver = () => Promise<string | null>;

export interface FileCheckOptions {
  folderPattern: string;
  filePattern: string;
  resolveProfileDir?: ProfileResolver;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.+^${}()|[\]\\]/g, "\\$&");
}

/** `*` and `?` wildcards, matched case-insensitively against a whole name. */
export function wildcardToRegExp(pattern: string): RegExp {
  const source = [...pattern]
    .map((ch) => (ch === "*" ? ".*" : ch === "?" ? "." : escapeRegExp(ch)))
    .join("");
  return new RegExp(`^${source}$`, "i");
}

export function splitPattern(pattern: string): string[] {
  return pattern.split(/[\\/]+/).filter((segment) => segment && segment !== ".");
}

async function listEntries(dir: string): Promise<Dirent[]> {
  try {
    return await readdir(dir, { withFileTypes: true });
  } catch {
    // missing, unreadable (ACL) or not a directory
    return [];
  }
}

/**
 * Expand a relative folder pattern under `root`, one segment at a time.
 * Every segment, wildcard or not, is matched case-insensitively against
 * the directories actually present, so results carry on-disk casing.
 */
export async function expandFolderPattern(root: string, pattern: string): Promise<string[]> {
  let current = [root];

  for (const segment of splitPattern(pattern)) {
    const matcher = wildcardToRegExp(segment);
    const next: string[] = [];
    for (const dir of current) {
      for (const entry of await listEntries(dir)) {
        if (entry.isDirectory() && matcher.test(entry.name)) {
          next.push(path.join(dir, entry.name));
        }
      }
    }
    current = next.sort();
  }

  return current;
}

export async function findMatchingFiles(folder: string, filePattern: string): Promise<string[]> {
  const matcher = wildcardToRegExp(filePattern);
  return (await listEntries(folder))
    .filter((entry) => entry.isFile() && matcher.test(entry.name))
    .map((entry) => path.join(folder, entry.name))
    .sort();
}

/**
 * Parse `query user` output and return the user of the Active session.
 *
 *  USERNAME              SESSIONNAME        ID  STATE   IDLE TIME  LOGON TIME
 * >jdoe                  console             1  Active      none   10/1/2026 8:02 AM
 */
export function parseActiveSessionUser(output: string): string | null {
  for (const line of output.split(/\r?\n/).slice(1)) {
    const columns = line.replace(/^>/, "").trim().split(/\s+/);
    if (columns.length > 1 && columns.some((column) => column.toLowerCase() === "active")) {
      return columns[0] || null;
    }
  }
  return null;
}

export interface ProfileListEntry {
  sid: string;
  profilePath: string;
}

/** Runs a program and resolves with its stdout; rejects on a non-zero exit. */
export type CommandRunner = (file: string, args: string[]) => Promise<string>;

const runCommand: CommandRunner = async (file, args) => (await execFileAsync(file, args)).stdout;

const PROFILE_LIST_KEY = "HKLM\\SOFTWARE\\Microsoft\\Windows NT\\CurrentVersion\\ProfileList";

// `query user` cuts user names at this width
const QUERY_USER_NAME_WIDTH = 20;

/** Expands %VAR% references the way REG_EXPAND_SZ values are expanded; unknown ones stay as-is. */
export function expandWindowsEnv(value: string, env: NodeJS.ProcessEnv): string {
  return value.replace(/%([^%]+)%/g, (match, name: string) => {
    const key = Object.keys(env).find((candidate) => candidate.toLowerCase() === name.toLowerCase());
    const expanded = key === undefined ? undefined : env[key];
    return expanded ?? match;
  });
}

/**
 * Parse `reg query <ProfileList> /s /v ProfileImagePath` output.
 *
 * HKEY_LOCAL_MACHINE\SOFTWARE\Microsoft\Windows NT\CurrentVersion\ProfileList\S-1-5-21-1-2-3-1001
 *     ProfileImagePath    REG_EXPAND_SZ    C:\Users\jdoe.CONTOSO
 */
export function parseProfileList(output: string, env: NodeJS.ProcessEnv = process.env): ProfileListEntry[] {
  const entries: ProfileListEntry[] = [];
  let sid: string | null = null;

  for (const line of output.split(/\r?\n/)) {
    const key = /\\(S-1-[\d-]+)\s*$/i.exec(line);
    if (/^HKEY_/i.test(line)) {
      sid = key ? key[1] : null;
      continue;
    }

    const value = /^\s+ProfileImagePath\s+REG_(?:EXPAND_)?SZ\s+(.+?)\s*$/i.exec(line);
    if (sid && value) {
      entries.push({ sid, profilePath: expandWindowsEnv(value[1], env) });
      sid = null;
    }
  }

  return entries;
}

/**
 * The profile registered for `sid`, or failing that one whose folder is
 * named after the user (`jdoe`, `jdoe.CONTOSO`, `jdoe.CONTOSO.000`).
 */
export function pickProfilePath(entries: ProfileListEntry[], user: string, sid: string | null): string | null {
  if (sid) {
    const bySid = entries.find((entry) => entry.sid.toLowerCase() === sid.toLowerCase());
    if (bySid) return bySid.profilePath;
  }

  const name = user.toLowerCase();
  const truncated = user.length >= QUERY_USER_NAME_WIDTH;
  const candidates = entries
    .map((entry) => entry.profilePath)
    .filter((profilePath) => {
      const folder = path.win32.basename(profilePath).toLowerCase();
      return folder === name || folder.startsWith(`${name}.`) || (truncated && folder.startsWith(name));
    })
    .sort();

  const exact = candidates.find((profilePath) => path.win32.basename(profilePath).toLowerCase() === name);
  return exact ?? candidates[0] ?? null;
}

async function lookupAccountSid(run: CommandRunner, user: string): Promise<string | null> {
  const account = user.replace(/'/g, "''");
  try {
    const stdout = await run("powershell.exe", [
      "-NoProfile",
      "-NonInteractive",
      "-Command",
      `(New-Object System.Security.Principal.NTAccount('${account}')).Translate([System.Security.Principal.SecurityIdentifier]).Value`,
    ]);
    const sid = stdout.trim();
    return /^S-1-[\d-]+$/i.test(sid) ? sid : null;
  } catch (err) {
    console.warn(`⚠️  Could not resolve the SID of ${user}: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}

async function readProfileList(run: CommandRunner, env: NodeJS.ProcessEnv): Promise<ProfileListEntry[]> {
  try {
    return parseProfileList(await run("reg", ["query", PROFILE_LIST_KEY, "/s", "/v", "ProfileImagePath"]), env);
  } catch (err) {
    console.warn(`⚠️  Could not read the profile list: ${err instanceof Error ? err.message : String(err)}`);
    return [];
  }
}

/**
 * Windows: the user of the active console/RDP session (the process itself
 * usually runs as SYSTEM). The profile folder comes from the registry
 * ProfileList, keyed by the user's SID; %SystemDrive%\Users\<user> is only
 * used when the registry has no match.
 */
export function createWindowsProfileResolver(
  run: CommandRunner = runCommand,
  env: NodeJS.ProcessEnv = process.env
): ProfileResolver {
  return async () => {
    let stdout: string;
    try {
      stdout = await run("query", ["user"]);
    } catch {
      // `query user` exits non-zero when there are no sessions
      return null;
    }

    const user = parseActiveSessionUser(stdout);
    if (!user) return null;

    const sid = await lookupAccountSid(run, user);
    const registered = pickProfilePath(await readProfileList(run, env), user, sid);
    if (registered) return registered;

    const profilesRoot = path.win32.join(env.SystemDrive ?? "C:", "\\Users");
    return path.win32.join(profilesRoot, user);
  };
}

/** Windows: see createWindowsProfileResolver. Elsewhere: the current user's home. */
export const resolveLoggedOnProfile: ProfileResolver = async () => {
  if (process.platform === "win32") {
    return createWindowsProfileResolver()();
  }
  return os.homedir() || null;
};

export function validatePatterns(folderPattern: string, filePattern: string): string | null {
  if (!folderPattern.trim()) return "Folder pattern is required";
  if (!filePattern.trim()) return "File pattern is required";
  if (/[\\/]/.test(filePattern)) return "File pattern must be a file name, not a path";
  if (path.isAbsolute(folderPattern) || path.win32.isAbsolute(folderPattern)) {
    return "Folder pattern must be relative to the user profile";
  }
  return null;
}

export async function checkUserFile({
  folderPattern,
  filePattern,
  resolveProfileDir = resolveLoggedOnProfile,
}: FileCheckOptions): Promise<FileCheckOutcome> {
  const invalid = validatePatterns(folderPattern, filePattern);
  if (invalid) return { status: "invalid", message: invalid };

  const profileDir = await resolveProfileDir();
  if (!profileDir) return { status: "no-user" };

  const folders = await expandFolderPattern(profileDir, folderPattern);
  for (const folder of folders) {
    const [file] = await findMatchingFiles(folder, filePattern.trim());
    if (file) return { status: "found", profileDir, file };
  }

  return { status: "not-found", profileDir, folders };
}
