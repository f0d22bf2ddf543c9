/**
 * Solidity event ABI for the three registries.
 *
 * Off-ledger indexers decode the log entries with this ABI, so names,
 * types and `indexed` flags must not change.
 */
export const RegistryEventsAbi = [
  {
    type: 'event',
    name: 'AgentRegistered',
    inputs: [
      { name: 'agentId', type: 'uint256', indexed: true },
      { name: 'agentAddress', type: 'address', indexed: true },
      { name: 'agentDomain', type: 'string', indexed: false },
      { name: 'agentDID', type: 'string', indexed: false },
      { name: 'description', type: 'string', indexed: false },
    ],
  },
  {
    type: 'event',
    name: 'AgentUpdated',
    inputs: [
      { name: 'agentId', type: 'uint256', indexed: true },
      { name: 'agentAddress', type: 'address', indexed: true },
      { name: 'agentDomain', type: 'string', indexed: false },
      { name: 'agentDID', type: 'string', indexed: false },
      { name: 'description', type: 'string', indexed: false },
    ],
  },
  {
    type: 'event',
    name: 'AgentDeveloperLinked',
    inputs: [
      { name: 'agentId', type: 'uint256', indexed: true },
      { name: 'developerDID', type: 'string', indexed: false },
    ],
  },
  {
    type: 'event',
    name: 'FeedbackAuthorized',
    inputs: [
      { name: 'clientAgentId', type: 'uint256', indexed: true },
      { name: 'serverAgentId', type: 'uint256', indexed: true },
      { name: 'authToken', type: 'bytes32', indexed: true },
    ],
  },
  {
    type: 'event',
    name: 'ValidationRequested',
    inputs: [
      { name: 'validatorAgentId', type: 'uint256', indexed: true },
      { name: 'serverAgentId', type: 'uint256', indexed: true },
      { name: 'dataHash', type: 'bytes32', indexed: true },
    ],
  },
  {
    type: 'event',
    name: 'ValidationResponded',
    inputs: [
      { name: 'validatorAgentId', type: 'uint256', indexed: true },
      { name: 'serverAgentId', type: 'uint256', indexed: true },
      { name: 'dataHash', type: 'bytes32', indexed: true },
      { name: 'score', type: 'uint8', indexed: false },
    ],
  },
] as const;
