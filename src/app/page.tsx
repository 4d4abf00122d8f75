"use client";

/**
 * Dashboard - Main Page
 *
 *   - Header: total / online agent counts
 *   - Intersection list with status, episode, latest reward and queue
 *   - Latest comparison charts
 */

import { AgentStatusPanel } from "@/client/components/agent-status-panel";
import { useDashboard } from "@/client";

export default function DashboardPage() {
  const { status, data, charts, loading, error, refresh } = useDashboard();

  return (
    <main className="min-h-screen bg-gray-50 dark:bg-gray-900 px-6 py-8">
      <div className="max-w-5xl mx-auto space-y-6">
        <header className="flex items-center justify-between">
          <div>
            <h1 className="text-2xl font-bold text-gray-900 dark:text-gray-100">
              Traffic Signal Coordination
            </h1>
            <p className="text-sm text-gray-500">
              {status
                ? `${status.online_agents} of ${status.total_agents} agents online`
                : "Connecting..."}
            </p>
          </div>
          <button
            onClick={() => void refresh()}
            disabled={loading}
            className="text-sm text-blue-600 dark:text-blue-400 hover:underline disabled:opacity-50"
          >
            {loading ? "Loading..." : "Refresh"}
          </button>
        </header>

        {error && (
          <div className="rounded-lg border border-red-200 bg-red-50 px-4 py-3 text-sm text-red-700">
            {error}
          </div>
        )}

        <AgentStatusPanel agents={status?.agents ?? {}} details={data ?? {}} />

        {charts?.timestamp && (
          <section className="grid gap-4 md:grid-cols-2">
            {/* eslint-disable-next-line @next/next/no-img-element */}
            <img src={charts.rewards_chart} alt="Rewards by agent" className="rounded-lg border" />
            {/* eslint-disable-next-line @next/next/no-img-element */}
            <img src={charts.queue_chart} alt="Queue length by agent" className="rounded-lg border" />
            <p className="text-xs text-gray-500 md:col-span-2">Updated {charts.timestamp}</p>
          </section>
        )}
      </div>
    </main>
  );
}
