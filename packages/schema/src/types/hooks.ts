import type { AssetEvent, AssetId, AssetLoadError, AssetPath, LoadState } from './asset'

export type HookResult = Promise<void> | void

export interface AssetServerHooks {
  /**
   * 资产新增 / 修改 / 移除
   * @param event 事件
   */
  'asset:event': (event: AssetEvent) => HookResult
  /**
   * 资产加载或重载失败
   */
  'asset:failed': (id: AssetId, error: AssetLoadError, path: AssetPath | undefined) => HookResult
  /**
   * 加载状态变化（requested 除外）
   */
  'load:state': (id: AssetId, state: LoadState) => HookResult
  /**
   * 数据源变更通知，触发热重载之前
   */
  'source:changed': (path: AssetPath) => HookResult
  /**
   * 一批重载完成
   * @param ids 本批次被替换的资产
   */
  'reload:done': (ids: AssetId[]) => HookResult
  /**
   * 元数据写入失败，旧记录保持不变
   */
  'meta:error': (source: string, error: Error) => HookResult
  /**
   * 服务关闭
   */
  'close': () => HookResult
}

export type AssetServerHookName = keyof AssetServerHooks
