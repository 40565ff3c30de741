/**
 * AccountService - resolves numeric owner/group ids to names.
 *
 * Live implementation reads the passwd and group databases once through
 * @effect/platform FileSystem. Locations come from the environment
 * (PERM_SNAPSHOT_PASSWD_FILE, PERM_SNAPSHOT_GROUP_FILE). Ids the files do
 * not list are looked up once each through `getent`.
 */

import { Config, Context, Data, Effect, Layer, Option, pipe } from "effect"
import { FileSystem } from "@effect/platform"
import { ShellServiceTag, type ShellService } from "./ShellService"

export type AccountDatabase = "user" | "group"

// =============================================================================
// Typed errors
// =============================================================================

export class AccountNotFound extends Data.TaggedError("AccountNotFound")<{
  readonly database: AccountDatabase
  readonly id: number
}> {}

// =============================================================================
// Service interface
// =============================================================================

export interface AccountService {
  readonly userName: (uid: number) => Effect.Effect<string, AccountNotFound>
  readonly groupName: (gid: number) => Effect.Effect<string, AccountNotFound>
}

export class AccountServiceTag extends Context.Tag("AccountService")<
  AccountServiceTag,
  AccountService
>() {}

// =============================================================================
// Configuration
// =============================================================================

export const AccountDatabaseConfig = Config.all({
  passwdFile: pipe(Config.string("PERM_SNAPSHOT_PASSWD_FILE"), Config.withDefault("/etc/passwd")),
  groupFile: pipe(Config.string("PERM_SNAPSHOT_GROUP_FILE"), Config.withDefault("/etc/group")),
})

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse passwd(5) / group(5) content into id -> name. Both formats keep the
 * name in field 1 and the numeric id in field 3. The first entry for an id
 * wins, matching getpwuid/getgrgid.
 */
export const parseAccountDatabase = (content: string): Map<number, string> => {
  const names = new Map<number, string>()

  for (const line of content.split("\n")) {
    const trimmed = line.trim()
    // NIS compat entries start with + or -
    if (trimmed === "" || trimmed.startsWith("#") || /^[+-]/.test(trimmed)) continue

    const [name, , idField] = trimmed.split(":")
    if (!name || !idField || !/^\d+$/.test(idField)) continue

    const id = parseInt(idField, 10)
    if (!names.has(id)) names.set(id, name)
  }

  return names
}

/** Second source for ids missing from the databases */
export type AccountFallback = (database: AccountDatabase, id: number) => Effect.Effect<Option.Option<string>>

const noFallback: AccountFallback = () => Effect.succeed(Option.none())

export const fromDatabases = (
  users: ReadonlyMap<number, string>,
  groups: ReadonlyMap<number, string>,
  fallback: AccountFallback = noFallback
): AccountService => {
  const lookup = (database: AccountDatabase, names: ReadonlyMap<number, string>) => {
    const resolved = new Map<number, Option.Option<string>>()

    const resolve = (id: number): Effect.Effect<Option.Option<string>> => {
      const known = names.get(id)
      if (known !== undefined) return Effect.succeed(Option.some(known))

      const cached = resolved.get(id)
      if (cached !== undefined) return Effect.succeed(cached)

      return pipe(
        fallback(database, id),
        Effect.tap((name) => Effect.sync(() => resolved.set(id, name)))
      )
    }

    return (id: number): Effect.Effect<string, AccountNotFound> =>
      pipe(
        resolve(id),
        Effect.flatMap((name): Effect.Effect<string, AccountNotFound> =>
          Option.isSome(name) ? Effect.succeed(name.value) : Effect.fail(new AccountNotFound({ database, id }))
        )
      )
  }

  return {
    userName: lookup("user", users),
    groupName: lookup("group", groups),
  }
}

// =============================================================================
// Name service fallback (getent)
// =============================================================================

const GETENT_DATABASES: Record<AccountDatabase, string> = { user: "passwd", group: "group" }

/**
 * Asks `getent` for ids the files do not list, so directory-service accounts
 * (LDAP, sssd, systemd-userdb) resolve. A missing `getent` or a non-zero exit
 * means no name.
 */
export const getentFallback =
  (shell: ShellService): AccountFallback =>
  (database, id) =>
    pipe(
      shell.exec("getent", [GETENT_DATABASES[database], String(id)]),
      Effect.map((result) =>
        result.exitCode === 0
          ? Option.fromNullable(parseAccountDatabase(result.stdout).get(id))
          : Option.none()
      ),
      Effect.tap((name) =>
        Effect.logDebug(`getent ${GETENT_DATABASES[database]} ${id}: ${Option.getOrElse(name, () => "not found")}`)
      ),
      Effect.catchAll((e) =>
        pipe(Effect.logDebug(`getent unavailable: ${e.message}`), Effect.as(Option.none<string>()))
      )
    )

// =============================================================================
// Live implementation (@effect/platform FileSystem)
// =============================================================================

const loadDatabase = (fs: FileSystem.FileSystem, path: string) =>
  pipe(
    fs.readFileString(path),
    Effect.map(parseAccountDatabase),
    Effect.tap((names) => Effect.logDebug(`Loaded ${names.size} ids from ${path}`)),
    Effect.catchAll((e) =>
      pipe(
        Effect.logWarning(`Cannot read account database ${path}: ${e.message}`),
        Effect.as(new Map<number, string>())
      )
    )
  )

export const AccountServiceLive = Layer.effect(
  AccountServiceTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const shell = yield* ShellServiceTag
    const config = yield* Effect.orDie(AccountDatabaseConfig)

    const users = yield* loadDatabase(fs, config.passwdFile)
    const groups = yield* loadDatabase(fs, config.groupFile)

    return fromDatabases(users, groups, getentFallback(shell))
  })
)
