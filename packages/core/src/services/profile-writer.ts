// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import {
  ACCOUNT_CONTAINER_KEY,
  clientProfilesPath,
  DEFAULT_OFFICE_VERSION,
  EXCHANGE_ONLINE_HOST,
  EXCHANGE_PROVIDER_UID,
  EXCHANGE_SERVICE_KEY,
  EXCHANGE_SERVICE_NAME,
  FIRST_ACCOUNT_KEY,
  NEXT_ACCOUNT_ID,
  NEXT_SERVICE_UID,
  outlookSettingsPath,
  SERVICE_NAME_VALUE,
  SUBSYSTEM_PROFILES_PATH,
  VALUE_NAMES,
} from "../constants.js";
import {
  binaryValue,
  type ConfigStore,
  dwordValue,
  type StorePath,
  stringValue,
} from "../store/index.js";
import type { ProfileOutcome } from "../types/index.js";
import { errorMessage } from "../utils/error-message.js";

export interface ProfileWriterOptions {
  /** Office version whose Outlook hive receives the profile (default `16.0`). */
  officeVersion?: string;
  /**
   * Delete the profile nodes this call created when a later write
   * fails. Off by default: a failed profile is left as written. A
   * subsystem peer node that already existed is kept; only the service
   * key created under it is removed.
   */
  rollbackOnFailure?: boolean;
}

/**
 * Writes Outlook profiles for Exchange Online mailboxes into a
 * {@link ConfigStore}.
 *
 * A profile is built from a fixed template: the profile node under
 * the Outlook profile root with one Exchange account, and a peer node
 * under the messaging subsystem root with one Exchange service. The
 * store is not transactional, so a failure midway leaves the records
 * written so far in place unless `rollbackOnFailure` is set. A later
 * run against the same name then reports the profile as existing.
 */
export class ProfileWriter {
  private readonly store: ConfigStore;
  private readonly officeVersion: string;
  private readonly rollbackOnFailure: boolean;

  constructor(store: ConfigStore, options?: ProfileWriterOptions) {
    this.store = store;
    this.officeVersion = options?.officeVersion ?? DEFAULT_OFFICE_VERSION;
    this.rollbackOnFailure = options?.rollbackOnFailure ?? false;
  }

  /** Store path of the Outlook profile node for `profileName`. */
  profilePath(profileName: string): StorePath {
    return [...clientProfilesPath(this.officeVersion), profileName];
  }

  /** Store path of the messaging subsystem peer node for `profileName`. */
  subsystemPath(profileName: string): StorePath {
    return [...SUBSYSTEM_PROFILES_PATH, profileName];
  }

  /**
   * Create the profile `profileName` for mailbox `identity`.
   *
   * Returns `skipped` without writing anything when a profile of that
   * name already exists; the check is by name only. Never throws: a
   * store failure aborts the remaining writes and yields `failed`.
   */
  async createProfile(
    profileName: string,
    identity: string,
    makeDefault: boolean,
  ): Promise<ProfileOutcome> {
    if (profileName === "" || identity === "") {
      return {
        status: "failed",
        reason: "Profile name and identity must not be empty",
      };
    }

    const profile = this.profilePath(profileName);
    const subsystem = this.subsystemPath(profileName);
    const created: StorePath[] = [];

    try {
      if (await this.store.exists(profile)) {
        return { status: "skipped" };
      }

      // A leftover subsystem peer is reused; rollback must not remove it.
      const subsystemExisted =
        this.rollbackOnFailure && (await this.store.exists(subsystem));

      await this.store.createNode(profile);
      created.push(profile);
      await this.store.createNode(subsystem);
      if (!subsystemExisted) {
        created.push(subsystem);
      }

      await this.store.setAttribute(profile, VALUE_NAMES.nextAccountId, dwordValue(NEXT_ACCOUNT_ID));
      await this.store.setAttribute(profile, VALUE_NAMES.nextServiceUid, dwordValue(NEXT_SERVICE_UID));

      const container = [...profile, ACCOUNT_CONTAINER_KEY];
      const account = [...container, FIRST_ACCOUNT_KEY];
      await this.store.createNode(container);
      await this.store.createNode(account);

      await this.store.setAttribute(account, VALUE_NAMES.accountName, stringValue(identity));
      await this.store.setAttribute(account, VALUE_NAMES.displayName, stringValue(identity));
      await this.store.setAttribute(account, VALUE_NAMES.email, stringValue(identity));
      await this.store.setAttribute(account, VALUE_NAMES.server, stringValue(EXCHANGE_ONLINE_HOST));
      await this.store.setAttribute(account, VALUE_NAMES.user, stringValue(identity));
      await this.store.setAttribute(account, VALUE_NAMES.providerUid, binaryValue(EXCHANGE_PROVIDER_UID));

      const service = [...subsystem, EXCHANGE_SERVICE_KEY];
      const serviceExisted =
        subsystemExisted && (await this.store.exists(service));
      await this.store.setAttribute(subsystem, VALUE_NAMES.nextServiceUid, dwordValue(NEXT_SERVICE_UID));
      await this.store.createNode(service);
      if (subsystemExisted && !serviceExisted) {
        created.push(service);
      }
      await this.store.setAttribute(service, SERVICE_NAME_VALUE, stringValue(EXCHANGE_SERVICE_NAME));

      if (makeDefault) {
        await this.store.setAttribute(
          outlookSettingsPath(this.officeVersion),
          VALUE_NAMES.defaultProfile,
          stringValue(profileName),
        );
      }
    } catch (error) {
      const reason = errorMessage(error);
      if (!this.rollbackOnFailure || created.length === 0) {
        return { status: "failed", reason, cause: error };
      }
      const note = await this.rollback(created);
      return { status: "failed", reason: `${reason} (${note})`, cause: error };
    }

    return { status: "created" };
  }

  /**
   * Delete the given nodes, newest first. Reports what happened
   * instead of throwing so the original failure stays the outcome.
   */
  private async rollback(nodes: StorePath[]): Promise<string> {
    const deleteNode = this.store.deleteNode?.bind(this.store);
    if (deleteNode === undefined) {
      return "rollback not supported by store";
    }
    try {
      for (const node of [...nodes].reverse()) {
        await deleteNode(node);
      }
    } catch (error) {
      return `rollback failed: ${errorMessage(error)}`;
    }
    return "rolled back";
  }
}
