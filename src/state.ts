import * as core from "@actions/core";
import type { FleetConfig } from "./config.js";
import type { CommandRunner } from "./runner.js";

export const stateBucketSuffix = "streamfleet.terraform.state";

export interface RemoteStateBackend {
  bucket: string;
  key: string;
  region: string;
  kmsKeyId: string;
}

/**
 * Derive the S3 remote state location from the account settings
 */
export function remoteStateBackend(
  config: Readonly<FleetConfig>,
): RemoteStateBackend {
  return {
    bucket: `${config.account.prefix}.${stateBucketSuffix}`,
    key: config.terraform.stateKey,
    region: config.account.region,
    kmsKeyId: `alias/${config.account.kmsKeyAlias}`,
  };
}

/**
 * Point Terraform at the remote state bucket. Encryption is always on.
 *
 * Running this again with the same backend changes nothing, so it is done at
 * the start of every plan.
 */
export async function configureRemoteState(
  runner: CommandRunner,
  backend: RemoteStateBackend,
  terraform = "terraform",
) {
  core.info("Refreshing remote state configuration");

  return runner.run(
    [
      terraform,
      "remote",
      "config",
      "-backend=s3",
      `-backend-config=bucket=${backend.bucket}`,
      `-backend-config=key=${backend.key}`,
      `-backend-config=region=${backend.region}`,
      `-backend-config=kms_key_id=${backend.kmsKeyId}`,
      "-backend-config=encrypt=true",
    ],
    {
      errorMessage: `Failed to configure remote state in "${backend.bucket}"`,
      quiet: true,
    },
  );
}

/**
 * Move state back to the local working directory, so that destroying the
 * state bucket does not pull the state out from under Terraform.
 */
export async function disableRemoteState(
  runner: CommandRunner,
  terraform = "terraform",
) {
  core.info("Disabling remote state");

  return runner.run([terraform, "remote", "config", "-disable"], {
    errorMessage: "Failed to disable remote state",
  });
}
