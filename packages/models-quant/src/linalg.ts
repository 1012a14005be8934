export type Matrix = number[][];

export const transpose = (matrix: Matrix): Matrix => {
	const rows = matrix.length;
	const cols = rows === 0 ? 0 : matrix[0].length;
	const result: Matrix = Array.from({ length: cols }, () =>
		Array<number>(rows).fill(0)
	);

	for (let i = 0; i < rows; i += 1) {
		for (let j = 0; j < cols; j += 1) {
			result[j][i] = matrix[i][j];
		}
	}

	return result;
};

export const multiply = (a: Matrix, b: Matrix): Matrix => {
	if (a.length === 0 || b.length === 0) {
		return [];
	}

	const aCols = a[0].length;
	const bRows = b.length;

	if (aCols !== bRows) {
		throw new Error("Matrix dimensions mismatch");
	}

	const bCols = b[0].length;
	const result: Matrix = Array.from({ length: a.length }, () =>
		Array<number>(bCols).fill(0)
	);

	for (let i = 0; i < a.length; i += 1) {
		for (let j = 0; j < bCols; j += 1) {
			let sum = 0;
			for (let k = 0; k < aCols; k += 1) {
				sum += a[i][k] * b[k][j];
			}
			result[i][j] = sum;
		}
	}

	return result;
};

export const multiplyVector = (matrix: Matrix, vector: number[]): number[] => {
	if (matrix.length === 0) {
		return [];
	}

	if (matrix[0].length !== vector.length) {
		throw new Error("Matrix/vector dimension mismatch");
	}

	return matrix.map((row) =>
		row.reduce((acc, value, idx) => acc + value * vector[idx], 0)
	);
};

/**
 * Gaussian elimination with partial pivoting. Returns null when a pivot falls
 * below `relativeTolerance` times the largest entry of the matrix.
 */
export const solveLinearSystem = (
	matrix: Matrix,
	vector: number[],
	relativeTolerance = 1e-10
): number[] | null => {
	const n = matrix.length;
	const augmented: Matrix = matrix.map((row, i) => [...row, vector[i]]);
	const scale = matrix.reduce(
		(max, row) => row.reduce((inner, value) => Math.max(inner, Math.abs(value)), max),
		0
	);
	if (scale === 0) {
		return null;
	}
	const tolerance = scale * relativeTolerance;

	for (let i = 0; i < n; i += 1) {
		let maxRow = i;
		for (let k = i + 1; k < n; k += 1) {
			if (Math.abs(augmented[k][i]) > Math.abs(augmented[maxRow][i])) {
				maxRow = k;
			}
		}

		if (Math.abs(augmented[maxRow][i]) < tolerance) {
			return null;
		}

		if (maxRow !== i) {
			[augmented[i], augmented[maxRow]] = [augmented[maxRow], augmented[i]];
		}

		for (let k = i + 1; k < n; k += 1) {
			const factor = augmented[k][i] / augmented[i][i];
			for (let j = i; j <= n; j += 1) {
				augmented[k][j] -= factor * augmented[i][j];
			}
		}
	}

	const solution = Array<number>(n).fill(0);
	for (let i = n - 1; i >= 0; i -= 1) {
		let sum = augmented[i][n];
		for (let j = i + 1; j < n; j += 1) {
			sum -= augmented[i][j] * solution[j];
		}
		solution[i] = sum / augmented[i][i];
	}

	return solution;
};

/** Ordinary least squares via the normal equations. */
export const leastSquares = (rows: Matrix, targets: number[]): number[] | null => {
	const xt = transpose(rows);
	return solveLinearSystem(multiply(xt, rows), multiplyVector(xt, targets));
};
