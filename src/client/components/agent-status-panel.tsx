"use client";

/**
 * AgentStatusPanel - per-intersection liveness and training progress
 */

import type { AgentDataView, AgentStatusView } from "@/core/broker/coordination-broker";

interface AgentStatusPanelProps {
  agents: Record<string, AgentStatusView>;
  details: Record<string, AgentDataView>;
}

const statusColor: Record<string, string> = {
  idle: "bg-gray-100 text-gray-600 dark:bg-gray-700 dark:text-gray-300",
  training: "bg-green-100 text-green-700 dark:bg-green-900 dark:text-green-300",
  simulating: "bg-blue-100 text-blue-600 dark:bg-blue-900 dark:text-blue-300",
  terminated: "bg-gray-200 text-gray-500 dark:bg-gray-600 dark:text-gray-400",
  offline: "bg-red-100 text-red-700 dark:bg-red-900 dark:text-red-300",
};

function lastOf(values: number[]): string {
  return values.length > 0 ? values[values.length - 1].toFixed(2) : "-";
}

export function AgentStatusPanel({ agents, details }: AgentStatusPanelProps) {
  const entries = Object.entries(agents);

  return (
    <div className="rounded-xl border border-gray-200 dark:border-gray-700 bg-white dark:bg-gray-800 shadow-sm">
      <div className="px-5 py-4 border-b border-gray-200 dark:border-gray-700">
        <h2 className="text-lg font-semibold text-gray-900 dark:text-gray-100">
          Intersections
        </h2>
      </div>
      {entries.length === 0 ? (
        <p className="px-5 py-6 text-sm text-gray-500">No agents connected yet.</p>
      ) : (
        <ul className="divide-y divide-gray-100 dark:divide-gray-700">
          {entries.map(([id, agent]) => {
            const detail = details[id];
            return (
              <li key={id} className="px-5 py-3 flex items-center justify-between gap-4">
                <div className="flex items-center gap-3">
                  <span
                    className={`h-2.5 w-2.5 rounded-full ${agent.online ? "bg-green-500" : "bg-red-500"}`}
                  />
                  <div>
                    <div className="font-medium text-gray-900 dark:text-gray-100">{agent.name}</div>
                    <div className="text-xs text-gray-500">{id}</div>
                  </div>
                </div>
                <div className="flex items-center gap-4 text-sm text-gray-600 dark:text-gray-300">
                  <span>Episode {agent.last_episode >= 0 ? agent.last_episode : "-"}</span>
                  <span>Reward {detail ? lastOf(detail.rewards) : "-"}</span>
                  <span>Queue {detail ? lastOf(detail.queue_lengths) : "-"}</span>
                  <span
                    className={`px-2 py-0.5 rounded text-xs font-medium ${statusColor[agent.status] ?? statusColor.idle}`}
                  >
                    {agent.status}
                  </span>
                </div>
              </li>
            );
          })}
        </ul>
      )}
    </div>
  );
}
