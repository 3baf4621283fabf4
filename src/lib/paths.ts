import path from "node:path"

export interface ServicePaths {
  STATE_DIR: string
  PID_PATH: string
  LOG_DIR: string
  LOG_PATH: string
}

// Every file the warden owns for one service identity lives under stateDir:
//   <stateDir>/.<identity>.pid
//   <stateDir>/logs/<identity>.log
export function resolvePaths(stateDir: string, identity: string): ServicePaths {
  const STATE_DIR = path.resolve(stateDir)
  const LOG_DIR = path.join(STATE_DIR, "logs")

  return {
    STATE_DIR,
    PID_PATH: path.join(STATE_DIR, `.${identity}.pid`),
    LOG_DIR,
    LOG_PATH: path.join(LOG_DIR, `${identity}.log`),
  }
}
