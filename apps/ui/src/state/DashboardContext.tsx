import { createContext, useContext, type ReactNode } from "react";

import type { Dashboard } from "./dashboard";

const DashboardContext = createContext<Dashboard | null>(null);

type DashboardProviderProps = {
  dashboard: Dashboard;
  children: ReactNode;
};

export function DashboardProvider({ dashboard, children }: DashboardProviderProps) {
  return <DashboardContext.Provider value={dashboard}>{children}</DashboardContext.Provider>;
}

export function useDashboard(): Dashboard {
  const dashboard = useContext(DashboardContext);
  if (!dashboard) {
    throw new Error("useDashboard must be used inside a DashboardProvider");
  }
  return dashboard;
}
