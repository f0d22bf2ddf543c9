import { encodeAbiParameters, toEventSelector, type AbiEvent, type AbiParameter, type Hex } from 'viem';
import { RegistryEventsAbi } from './abis.js';
import type { EncodedLog, RegistryEvent } from './types.js';

/**
 * ABI-encode an event into log topics and data.
 *
 * Topic 0 is the event selector, followed by one topic per indexed
 * argument; the remaining arguments are packed into `data`. All indexed
 * arguments are value types, so no topic is a hash of its value.
 */
export function encodeRegistryEvent(event: RegistryEvent): EncodedLog {
  const item: AbiEvent | undefined = RegistryEventsAbi.find((e) => e.name === event.eventName);
  if (!item) {
    throw new Error(`No ABI entry for event ${event.eventName}`);
  }

  const values: Record<string, unknown> = { ...event.args };
  const topics: [Hex, ...Hex[]] = [toEventSelector(item)];
  const dataParams: AbiParameter[] = [];
  const dataValues: unknown[] = [];

  for (const input of item.inputs) {
    const value = values[input.name ?? ''];
    if (input.indexed) {
      const params: readonly AbiParameter[] = [input];
      topics.push(encodeAbiParameters(params, [value]));
    } else {
      dataParams.push(input);
      dataValues.push(value);
    }
  }

  return {
    topics,
    data: dataParams.length > 0 ? encodeAbiParameters(dataParams, dataValues) : '0x',
  };
}

/** Agent ids an event refers to, in argument order */
export function agentIdsOf(event: RegistryEvent): bigint[] {
  switch (event.eventName) {
    case 'AgentRegistered':
    case 'AgentUpdated':
    case 'AgentDeveloperLinked':
      return [event.args.agentId];
    case 'FeedbackAuthorized':
      return [event.args.clientAgentId, event.args.serverAgentId];
    case 'ValidationRequested':
    case 'ValidationResponded':
      return [event.args.validatorAgentId, event.args.serverAgentId];
  }
}
