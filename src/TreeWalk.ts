/**
 * enterの戻り値
 * - descend: 子をたどってからleaveを呼ぶ
 * - skip-children: 子をたどらずにleaveを呼ぶ
 * - prune: 子もleaveも飛ばす
 */
export type WalkAction = 'descend' | 'skip-children' | 'prune';

export interface TreeVisitor<N> {
  enter(node: N): WalkAction;
  leave?(node: N): void;
}

/**
 * 木を深さ優先でたどる
 * 更新と描画の両方がこの1つの走査を使う
 * @param root 根ノード
 * @param childrenOf 子ノードの列挙
 * @param visitor 訪問処理
 */
export function walkTree<N>(root: N, childrenOf: (node: N) => Iterable<N>, visitor: TreeVisitor<N>): void {
  const action = visitor.enter(root);
  if (action === 'prune') return;

  if (action === 'descend') {
    for (const child of childrenOf(root)) {
      walkTree(child, childrenOf, visitor);
    }
  }

  visitor.leave?.(root);
}
