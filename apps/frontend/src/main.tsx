import { StrictMode } from "react";
import { createRoot } from "react-dom/client";

import { FanControlPage } from "@/app/FanControlPage";
import "@/app/index.css";

const root = document.getElementById("root");
if (!root) throw new Error("Root element not found");

createRoot(root).render(
  <StrictMode>
    <FanControlPage />
  </StrictMode>,
);
