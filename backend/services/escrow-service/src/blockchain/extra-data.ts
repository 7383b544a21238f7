import { AbiCoder, ZeroHash } from 'ethers';
import { ValidationError } from '../errors';
import type { ApiApprovalMethod } from '../types/escrow.types';
import { API_APPROVAL_DATA_TYPE, ONCHAIN_APPROVAL_DATA_TYPE } from './abi';

const coder = AbiCoder.defaultAbiCoder();

export type OracleSources = Readonly<Record<ApiApprovalMethod, string>>;

export interface TweetRepostApproval {
  method: 'tweet_repost';
  tweetId: string;
  username: string;
}

export interface CrosschainNftApproval {
  method: 'crosschain_nft';
  rpcUrl: string;
  nftContract: string;
  tokenId: string;
  expectedOwner: string;
}

export type ApiApprovalRequest = TweetRepostApproval | CrosschainNftApproval;

export interface OnchainApprovalRequest {
  destination: string;
  callData: string;
  expectedResult: string;
}

export type ExtraDataRequest =
  | { escrowType: 'disputable' }
  | { escrowType: 'api_approval'; approval: ApiApprovalRequest }
  | { escrowType: 'onchain_approval'; approval: OnchainApprovalRequest };

export function normalizeTweetUsername(username: string): string {
  return username.trim().replace(/^@/, '').trim();
}

function apiApprovalArgs(approval: ApiApprovalRequest): string[] {
  switch (approval.method) {
    case 'tweet_repost':
      return [approval.tweetId.trim(), normalizeTweetUsername(approval.username)];
    case 'crosschain_nft':
      return [approval.rpcUrl, approval.nftContract, approval.tokenId, approval.expectedOwner];
  }
}

/**
 * Extra data for an api_approval fill: the oracle script for the method plus
 * its string arguments. The request id is left zero for the contract to set.
 */
export function encodeApiApprovalData(
  approval: ApiApprovalRequest,
  sources: OracleSources,
  encryptedSecretsUrls: string
): string {
  const source = sources[approval.method];
  if (source === undefined) {
    throw ValidationError.invalidField('apiApprovalMethod', `unknown method ${String(approval.method)}`);
  }

  return coder.encode(
    [API_APPROVAL_DATA_TYPE],
    [
      {
        source,
        encryptedSecretsUrls,
        args: apiApprovalArgs(approval),
        bytesArgs: [],
        requestId: ZeroHash,
      },
    ]
  );
}

export function encodeOnchainApprovalData(approval: OnchainApprovalRequest): string {
  return coder.encode(
    [ONCHAIN_APPROVAL_DATA_TYPE],
    [
      {
        destination: approval.destination,
        data: approval.callData,
        expectedResult: approval.expectedResult,
      },
    ]
  );
}

export function encodeExtraData(
  request: ExtraDataRequest,
  sources: OracleSources,
  encryptedSecretsUrls: string
): string {
  switch (request.escrowType) {
    case 'disputable':
      return '0x';
    case 'api_approval':
      return encodeApiApprovalData(request.approval, sources, encryptedSecretsUrls);
    case 'onchain_approval':
      return encodeOnchainApprovalData(request.approval);
  }
}
