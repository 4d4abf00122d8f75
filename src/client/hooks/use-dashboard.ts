"use client";

/**
 * useDashboard - polls the coordination server for the dashboard.
 *
 * Plain request/response on an interval; agents already tolerate several
 * seconds of staleness.
 */

import { useState, useCallback, useRef, useEffect } from "react";
import { CoordinationClient } from "../coordination-client";
import type {
  ChartsResponse,
  DataResponse,
  StatusResponse,
} from "@/core/broker/coordination-broker";

export interface UseDashboardState {
  status: StatusResponse | null;
  data: DataResponse | null;
  charts: ChartsResponse | null;
  loading: boolean;
  error: string | null;
}

export function useDashboard(
  intervalMs: number = 5000,
  baseUrl: string = ""
): UseDashboardState & { refresh: () => Promise<void> } {
  const clientRef = useRef(new CoordinationClient(baseUrl));
  const [state, setState] = useState<UseDashboardState>({
    status: null,
    data: null,
    charts: null,
    loading: false,
    error: null,
  });

  const refresh = useCallback(async () => {
    try {
      setState((s) => ({ ...s, loading: true, error: null }));
      const [status, data, charts] = await Promise.all([
        clientRef.current.status(),
        clientRef.current.data(),
        clientRef.current.latestCharts(),
      ]);
      setState({ status, data, charts, loading: false, error: null });
    } catch (err) {
      console.error("[useDashboard] Refresh failed:", err);
      setState((s) => ({
        ...s,
        loading: false,
        error: err instanceof Error ? err.message : "Failed to load status",
      }));
    }
  }, []);

  useEffect(() => {
    void refresh();
    const timer = setInterval(() => void refresh(), intervalMs);
    return () => clearInterval(timer);
  }, [refresh, intervalMs]);

  return { ...state, refresh };
}
