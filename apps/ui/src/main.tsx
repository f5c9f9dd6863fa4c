import React from "react";
import ReactDOM from "react-dom/client";

import App from "./App";
import { getSettings } from "./settings";
import { createDashboard } from "./state/dashboard";
import { DashboardProvider } from "./state/DashboardContext";
import "./styles/index.css";

const container = document.getElementById("root");
if (!container) {
  throw new Error("Missing #root element");
}

const dashboard = createDashboard(getSettings());
window.addEventListener("pagehide", (event) => {
  if (!event.persisted) {
    dashboard.dispose();
  }
});

ReactDOM.createRoot(container).render(
  <React.StrictMode>
    <DashboardProvider dashboard={dashboard}>
      <App />
    </DashboardProvider>
  </React.StrictMode>
);
