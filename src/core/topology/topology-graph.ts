/**
 * TopologyGraph - green-wave offsets between linked intersections.
 *
 * Connectivity is undirected (a link declared by either agent counts), but
 * offsets are directional: `from` is upstream, `to` is downstream and its
 * cycle length folds the travel time. Offsets are computed lazily and
 * cached until the registry revision changes.
 */

import { Agent, isOnline } from "../models/agent";
import { LinkOffset, NetworkView } from "../models/link";
import { AgentRegistry } from "../store/agent-registry";
import { NoCoordinationAvailableError, NoLinkError, UnknownAgentError } from "../errors";
import { haversineDistanceM, kmhToMps } from "./geo";

export interface TopologyOptions {
  assumedSpeedKmh: number;
  connectionDistanceM: number;
}

export function isLinked(a: Agent, b: Agent): boolean {
  return a.links.includes(b.id) || b.links.includes(a.id);
}

export class TopologyGraph {
  /** fromId -> toId -> offset */
  private cache = new Map<string, Map<string, LinkOffset>>();
  private cacheRevision = -1;

  constructor(
    private registry: AgentRegistry,
    private options: TopologyOptions
  ) {}

  /**
   * Offset for the downstream signal `toId` relative to upstream `fromId`.
   * An upstream that is offline or terminated gives no coordination.
   */
  async computeOffset(fromId: string, toId: string): Promise<LinkOffset> {
    const revision = this.registry.revision();
    const from = await this.registry.get(fromId);
    if (!from) throw new UnknownAgentError(fromId);
    const to = await this.registry.get(toId);
    if (!to) throw new UnknownAgentError(toId);

    if (from.id === to.id || !isLinked(from, to)) {
      throw new NoLinkError(fromId, toId);
    }
    if (!isOnline(from)) {
      throw new NoCoordinationAvailableError(toId);
    }
    return this.offsetBetween(from, to, revision);
  }

  /**
   * Nearest online linked agent, treated as upstream of `agentId`.
   */
  async resolveCoordination(agentId: string): Promise<LinkOffset> {
    const revision = this.registry.revision();
    const requester = await this.registry.get(agentId);
    if (!requester) throw new UnknownAgentError(agentId);

    const agents = await this.registry.list();
    let best: LinkOffset | undefined;
    for (const candidate of agents) {
      if (candidate.id === requester.id) continue;
      if (!isLinked(candidate, requester) || !isOnline(candidate)) continue;

      const link = this.offsetBetween(candidate, requester, revision);
      if (!best || link.distanceM < best.distanceM) {
        best = link;
      }
    }

    if (!best) {
      throw new NoCoordinationAvailableError(agentId);
    }
    return best;
  }

  /**
   * Every declared link in both directions, for the dashboard map.
   */
  async network(): Promise<NetworkView> {
    const revision = this.registry.revision();
    const agents = await this.registry.list();
    const byId = new Map(agents.map((a) => [a.id, a]));

    const links: LinkOffset[] = [];
    const seen = new Map<string, Set<string>>();
    for (const agent of agents) {
      for (const neighborId of agent.links) {
        const neighbor = byId.get(neighborId);
        if (!neighbor) continue;

        for (const [from, to] of [
          [agent, neighbor],
          [neighbor, agent],
        ]) {
          const targets = seen.get(from.id) ?? new Set<string>();
          if (targets.has(to.id)) continue;
          targets.add(to.id);
          seen.set(from.id, targets);
          links.push(this.offsetBetween(from, to, revision));
        }
      }
    }

    return {
      nodes: agents.map((a) => ({
        id: a.id,
        name: a.name,
        latitude: a.position.latitude,
        longitude: a.position.longitude,
        online: isOnline(a),
      })),
      links,
    };
  }

  private offsetBetween(from: Agent, to: Agent, revision: number): LinkOffset {
    if (revision > this.cacheRevision) {
      this.cache.clear();
      this.cacheRevision = revision;
    }
    const cacheable = revision === this.cacheRevision;
    const cached = cacheable ? this.cache.get(from.id)?.get(to.id) : undefined;
    if (cached) return { ...cached };

    const distanceM = haversineDistanceM(from.position, to.position);
    const travelTimeS = distanceM / kmhToMps(this.options.assumedSpeedKmh);
    const link: LinkOffset = {
      fromId: from.id,
      toId: to.id,
      distanceM,
      travelTimeS,
      cycleLengthS: to.cycleLengthS,
      offsetS: travelTimeS % to.cycleLengthS,
      outOfRange: distanceM > this.options.connectionDistanceM,
    };

    if (cacheable) {
      const row = this.cache.get(from.id) ?? new Map<string, LinkOffset>();
      row.set(to.id, link);
      this.cache.set(from.id, row);
    }
    return { ...link };
  }
}
