import { verifyTypedData } from 'ethers/lib/utils';
import { Address, FailureReason, Result, Signature } from '../types';
import { fail, ok } from '../utils';

export type PermitDomain = {
  name: string;
  version: string;
  chainId: number;
  verifyingContract: Address;
};

export const PERMIT_TYPES: Record<string, { name: string; type: string }[]> = {
  Permit: [
    { name: 'owner', type: 'address' },
    { name: 'spender', type: 'address' },
    { name: 'value', type: 'uint256' },
    { name: 'nonce', type: 'uint256' },
    { name: 'deadline', type: 'uint256' },
  ],
};

export type PermitMessage = {
  owner: Address;
  spender: Address;
  value: string;
  nonce: string;
  deadline: string;
};

export function getPermitDomain(
  name: string,
  chainId: number,
  verifyingContract: Address,
): PermitDomain {
  return { name, version: '1', chainId, verifyingContract };
}

export function buildPermitMessage(
  owner: Address,
  spender: Address,
  value: bigint,
  nonce: bigint,
  deadline: number,
): PermitMessage {
  return {
    owner,
    spender,
    value: value.toString(),
    nonce: nonce.toString(),
    deadline: deadline.toString(),
  };
}

/**
 * Recovers the signer of an EIP-712 share approval. A signature that does
 * not decode is reported as InvalidSignature rather than thrown.
 */
export function recoverPermitSigner(
  domain: PermitDomain,
  message: PermitMessage,
  signature: Signature,
): Result<Address> {
  try {
    return ok(
      verifyTypedData(domain, PERMIT_TYPES, message, signature).toLowerCase(),
    );
  } catch (e) {
    return fail(
      FailureReason.InvalidSignature,
      e instanceof Error ? e.message : String(e),
    );
  }
}
