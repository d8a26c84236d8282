// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/distributor/adapters/abi`
 * Purpose: Minimal ABIs for the fee token (ERC-20) and the voting-escrow contract.
 * Scope: Only the functions the adapters call. Does not include events or admin functions.
 * Invariants: `as const` so viem infers argument and return types.
 * Side-effects: none
 * Notes: Voting power is read from the point history, not from the contract's balanceOf/totalSupply, which only extrapolate forward from the latest point.
 * Links: ViemFeeToken, ViemVotingEscrowOracle
 * @public
 */

export const ERC20_ABI = [
  {
    name: "balanceOf",
    type: "function",
    stateMutability: "view",
    inputs: [{ name: "account", type: "address" }],
    outputs: [{ name: "", type: "uint256" }],
  },
  {
    name: "transfer",
    type: "function",
    stateMutability: "nonpayable",
    inputs: [
      { name: "to", type: "address" },
      { name: "amount", type: "uint256" },
    ],
    outputs: [{ name: "", type: "bool" }],
  },
  {
    name: "transferFrom",
    type: "function",
    stateMutability: "nonpayable",
    inputs: [
      { name: "from", type: "address" },
      { name: "to", type: "address" },
      { name: "amount", type: "uint256" },
    ],
    outputs: [{ name: "", type: "bool" }],
  },
] as const;

const POINT_OUTPUTS = [
  { name: "bias", type: "int128" },
  { name: "slope", type: "int128" },
  { name: "ts", type: "uint256" },
  { name: "blk", type: "uint256" },
] as const;

export const VOTING_ESCROW_ABI = [
  {
    name: "epoch",
    type: "function",
    stateMutability: "view",
    inputs: [],
    outputs: [{ name: "", type: "uint256" }],
  },
  {
    name: "point_history",
    type: "function",
    stateMutability: "view",
    inputs: [{ name: "arg0", type: "uint256" }],
    outputs: POINT_OUTPUTS,
  },
  {
    name: "slope_changes",
    type: "function",
    stateMutability: "view",
    inputs: [{ name: "arg0", type: "uint256" }],
    outputs: [{ name: "", type: "int128" }],
  },
  {
    name: "user_point_epoch",
    type: "function",
    stateMutability: "view",
    inputs: [{ name: "arg0", type: "address" }],
    outputs: [{ name: "", type: "uint256" }],
  },
  {
    name: "user_point_history",
    type: "function",
    stateMutability: "view",
    inputs: [
      { name: "arg0", type: "address" },
      { name: "arg1", type: "uint256" },
    ],
    outputs: POINT_OUTPUTS,
  },
] as const;
