export { resolveDashboardConfig, type DashboardConfig } from "./dashboard-control";
export { BOX, LayoutPolicy } from "./layout-policy";
export { LogBuffer } from "./log-buffer";
export { Style, type StyleToken } from "./style";
export { TTYRenderer } from "./tty-renderer";
export { TTYScreen } from "./tty-screen";
