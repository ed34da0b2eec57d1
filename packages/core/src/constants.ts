// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

/**
 * Base profile name used when none is given. Each provisioned profile
 * is named `<base> - <UPN>`.
 */
export const DEFAULT_PROFILE_BASE_NAME = "M365 Profile";

/** Separator between the base name and the UPN in a profile name. */
export const PROFILE_NAME_SEPARATOR = " - ";

/**
 * Office version whose Outlook registry hive is targeted (Office 2016,
 * 2019, 2021 and Microsoft 365 Apps all use `16.0`).
 */
export const DEFAULT_OFFICE_VERSION = "16.0";

/** Name of the CSV column holding the mailbox identity. */
export const UPN_COLUMN = "UPN";

/** Process names of the Outlook desktop client. */
export const OUTLOOK_PROCESS_NAMES = ["outlook.exe", "OUTLOOK.EXE", "Outlook.exe"];

/** Host of the Exchange Online mailbox endpoint. */
export const EXCHANGE_ONLINE_HOST = "outlook.office365.com";

/**
 * Key of the Outlook account manager container under a profile. Holds
 * one numbered subkey per mail account.
 */
export const ACCOUNT_CONTAINER_KEY = "9375CFF0413111d3B88A00104B2A6676";

/** Subkey of the first (and only) account in a provisioned profile. */
export const FIRST_ACCOUNT_KEY = "00000001";

/** Global profile section of the Exchange message service. */
export const EXCHANGE_SERVICE_KEY = "13dbb0c8aa05101a9bb000aa002fc45a";

/** Property tag of `PR_SERVICE_NAME` as stored in a profile section. */
export const SERVICE_NAME_VALUE = "001e3d09";

/** Message service tag of the Exchange transport. */
export const EXCHANGE_SERVICE_NAME = "MSEMS";

/**
 * Account-type identifier `{ED475418-B0D6-11D2-8C3B-00104B2A6676}` in
 * Windows GUID memory layout (first three fields little-endian).
 * Outlook selects the Exchange connection handler by this exact value.
 */
export const EXCHANGE_PROVIDER_UID: readonly number[] = Object.freeze([
  0x18, 0x54, 0x47, 0xed, 0xd6, 0xb0, 0xd2, 0x11,
  0x8c, 0x3b, 0x00, 0x10, 0x4b, 0x2a, 0x66, 0x76,
]);

/** Next account id seeded on a new profile (one account is written). */
export const NEXT_ACCOUNT_ID = 1;

/** Next service uid seeded on a new profile (one service is written). */
export const NEXT_SERVICE_UID = 2;

/** Registry value names written by the profile template. */
export const VALUE_NAMES = {
  nextAccountId: "NextAccountID",
  nextServiceUid: "NextServiceUID",
  accountName: "Account Name",
  displayName: "Display Name",
  email: "Email",
  server: "Server",
  user: "User",
  providerUid: "clsid",
  defaultProfile: "DefaultProfile",
} as const;

/**
 * Outlook settings node for the given Office version, relative to
 * `HKEY_CURRENT_USER`. Holds the `DefaultProfile` value.
 */
export function outlookSettingsPath(officeVersion: string): string[] {
  return ["Software", "Microsoft", "Office", officeVersion, "Outlook"];
}

/** Outlook profile root for the given Office version. */
export function clientProfilesPath(officeVersion: string): string[] {
  return [...outlookSettingsPath(officeVersion), "Profiles"];
}

/** Messaging subsystem profile root, shared by all Office versions. */
export const SUBSYSTEM_PROFILES_PATH: readonly string[] = Object.freeze([
  "Software",
  "Microsoft",
  "Windows NT",
  "CurrentVersion",
  "Windows Messaging Subsystem",
  "Profiles",
]);
