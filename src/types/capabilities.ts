// 引擎依赖的两个外部能力：串口枚举与设备识别

export interface PortLister {
  /**
   * 返回当前可用串口的标识集合
   * 枚举失败时抛出异常，由调度器包装为 EnumerationError
   */
  listPorts(): Promise<string[]>;
}

export interface IdentifyOptions {
  timeoutMs: number;
  signal: AbortSignal;
}

export interface DeviceIdentifier {
  /**
   * 读取指定端口上设备的 MAC
   * 失败抛出 IdentifyError（TIMEOUT / ACCESS_DENIED / PROTOCOL_ERROR / DISCONNECTED），
   * signal 触发时应尽快中止
   */
  identify(portId: string, opts: IdentifyOptions): Promise<string>;
}
