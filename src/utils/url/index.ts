const normalizeBase = (base: string): string => base.replace(/\/+$/, "");

const normalizePath = (path?: string): string => {
  if (!path) {
    return "";
  }
  return path.startsWith("/") ? path : `/${path}`;
};

export const buildBackendUrl = (baseUrl: string, path?: string): string => {
  return `${normalizeBase(baseUrl)}${normalizePath(path)}`;
};
