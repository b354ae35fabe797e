/**
 * @file 矩形区域
 *
 * 以 1 为起点的屏幕坐标（VT-100 手册中左上角为 (1, 1)）。
 * 下边界和右边界为开区间：点 (y, x) 在矩形内当且仅当
 * top <= y < bottom 且 left <= x < right。
 */

export interface RectBounds {
	top: number;
	bottom: number;
	left: number;
	right: number;
}

/** 不可变的矩形区域，所有绘制调用都先经它裁剪 */
export class BoundingRectangle {
	readonly top: number;
	readonly bottom: number;
	readonly left: number;
	readonly right: number;

	constructor(bounds: RectBounds) {
		if (bounds.bottom < bounds.top || bounds.right < bounds.left) {
			throw new Error(
				`Malformed rectangle: top=${bounds.top}, bottom=${bounds.bottom}, left=${bounds.left}, right=${bounds.right}`,
			);
		}
		this.top = bounds.top;
		this.bottom = bounds.bottom;
		this.left = bounds.left;
		this.right = bounds.right;
	}

	get width(): number {
		return this.right - this.left;
	}

	get height(): number {
		return this.bottom - this.top;
	}

	contains(y: number, x: number): boolean {
		return y >= this.top && y < this.bottom && x >= this.left && x < this.right;
	}

	offset(dy: number, dx: number): BoundingRectangle {
		return new BoundingRectangle({
			top: this.top + dy,
			bottom: this.bottom + dy,
			left: this.left + dx,
			right: this.right + dx,
		});
	}

	/**
	 * 用另一个矩形裁剪本矩形。
	 * 每条边独立地夹在对方的范围内，结果可能退化为零尺寸，但不会报错。
	 * 边的夹取是单调的，所以结果的宽高不会为负。
	 */
	clip(other: BoundingRectangle): BoundingRectangle {
		return new BoundingRectangle({
			top: Math.min(Math.max(this.top, other.top), other.bottom),
			bottom: Math.max(Math.min(this.bottom, other.bottom), other.top),
			left: Math.min(Math.max(this.left, other.left), other.right),
			right: Math.max(Math.min(this.right, other.right), other.left),
		});
	}

	equals(other: BoundingRectangle): boolean {
		return (
			this.top === other.top && this.bottom === other.bottom && this.left === other.left && this.right === other.right
		);
	}

	toString(): string {
		return `BoundingRectangle(top=${this.top}, bottom=${this.bottom}, left=${this.left}, right=${this.right})`;
	}
}

/** 以左上角和尺寸构造矩形 */
export function rectAt(top: number, left: number, height: number, width: number): BoundingRectangle {
	return new BoundingRectangle({ top, bottom: top + height, left, right: left + width });
}
