/**
 * @wcam/ledger — Delegated authorization (permit).
 *
 * Sole owner of per-owner nonces. A permit is an EIP-712 signed
 * Permit(owner, spender, value, nonce, deadline) struct; a valid one
 * moves the owner's nonce forward by exactly one and sets the allowance
 * through the same capability the direct approve path uses.
 *
 * The owner's current nonce is bound into the digest instead of being
 * compared separately: a replayed or stale permit recovers to some other
 * address and fails as SIGNER_MISMATCH, the same path as a wrong signer.
 */

import { encodeAbiParameters, hashTypedData, keccak256, toHex, type Address, type Hex } from "viem";
import type { PermitDomain, PermitMessage, SignedPermit } from "@wcam/types";
import type { AllowanceCapability } from "./allowances.js";
import { recoverSigner } from "./signature.js";
import type { Checkpointable, Rollback } from "./transactor.js";
import type { Clock, Eip712DomainInfo, SignatureRecovery } from "./types.js";
import { LedgerError } from "./types.js";

export const PERMIT_TYPES = {
  Permit: [
    { name: "owner", type: "address" },
    { name: "spender", type: "address" },
    { name: "value", type: "uint256" },
    { name: "nonce", type: "uint256" },
    { name: "deadline", type: "uint256" },
  ],
} as const;

const DOMAIN_TYPEHASH = keccak256(
  toHex("EIP712Domain(string name,string version,uint256 chainId,address verifyingContract)"),
);

/** name, version, chainId and verifyingContract are all present. */
const DOMAIN_FIELDS: Hex = "0x0f";

export class PermitAuthority implements Checkpointable {
  private _nonces = new Map<Address, bigint>();

  constructor(
    private readonly _domain: PermitDomain,
    private readonly _allowances: AllowanceCapability,
    private readonly _clock: Clock,
    private readonly _recover: SignatureRecovery = recoverSigner,
  ) {}

  nonces(owner: Address): bigint {
    return this._nonces.get(owner) ?? 0n;
  }

  /**
   * EIP-712 digest an owner signs for `message`.
   */
  digest(message: PermitMessage): Hex {
    return hashTypedData({
      domain: {
        name: this._domain.name,
        version: this._domain.version,
        chainId: this._domain.chainId,
        verifyingContract: this._domain.verifyingContract,
      },
      types: PERMIT_TYPES,
      primaryType: "Permit",
      message: {
        owner: message.owner,
        spender: message.spender,
        value: message.value,
        nonce: message.nonce,
        deadline: message.deadline,
      },
    });
  }

  /** Hash of the EIP-712 domain. */
  domainSeparator(): Hex {
    return keccak256(
      encodeAbiParameters(
        [{ type: "bytes32" }, { type: "bytes32" }, { type: "bytes32" }, { type: "uint256" }, { type: "address" }],
        [
          DOMAIN_TYPEHASH,
          keccak256(toHex(this._domain.name)),
          keccak256(toHex(this._domain.version)),
          BigInt(this._domain.chainId),
          this._domain.verifyingContract,
        ],
      ),
    );
  }

  eip712Domain(): Eip712DomainInfo {
    return {
      fields: DOMAIN_FIELDS,
      name: this._domain.name,
      version: this._domain.version,
      chainId: this._domain.chainId,
      verifyingContract: this._domain.verifyingContract,
    };
  }

  /**
   * Verify a signed permit and, on success, consume the nonce and set
   * the allowance. Throws without touching any state otherwise.
   *
   * @throws LedgerError EXPIRED_AUTHORIZATION when now > deadline
   * @throws LedgerError INVALID_SIGNATURE when no signer can be recovered
   * @throws LedgerError SIGNER_MISMATCH when the signer is not the owner
   */
  verify(permit: SignedPermit): void {
    const now = this._clock();
    if (now > permit.deadline) {
      throw new LedgerError(
        "EXPIRED_AUTHORIZATION",
        `Permit expired at ${permit.deadline.toString()}, now ${now.toString()}`,
        { deadline: permit.deadline.toString(), now: now.toString() },
      );
    }

    const nonce = this.nonces(permit.owner);
    const digest = this.digest({
      owner: permit.owner,
      spender: permit.spender,
      value: permit.value,
      nonce,
      deadline: permit.deadline,
    });

    const signer = this._recover(digest, permit.signature);
    if (signer === null) {
      throw new LedgerError("INVALID_SIGNATURE", "Permit signature is malformed or unrecoverable");
    }
    if (signer !== permit.owner) {
      throw new LedgerError(
        "SIGNER_MISMATCH",
        `Permit signed by ${signer}, expected ${permit.owner}`,
        { signer, owner: permit.owner },
      );
    }

    this._nonces.set(permit.owner, nonce + 1n);
    this._allowances.approve(permit.owner, permit.spender, permit.value);
  }

  checkpoint(): Rollback {
    const nonces = new Map(this._nonces);
    return () => {
      this._nonces = nonces;
    };
  }
}
