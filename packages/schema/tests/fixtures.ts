import type { RawMapping } from "@resource-spec/core";

/**
 * A valid model description at the latest format version.
 */
export function createModel(overrides: RawMapping = {}): RawMapping {
	return {
		format_version: "0.4.10",
		type: "model",
		name: "UNet 2D nuclei",
		description: "Segments nuclei in fluorescence microscopy images.",
		authors: [{ name: "Jane Doe", affiliation: "Example Lab" }],
		cite: [{ text: "Ronneberger et al. U-Net", doi: "10.1007/978-3-319-24574-4_28" }],
		documentation: "README.md",
		license: "MIT",
		timestamp: "2024-03-01T12:00:00Z",
		inputs: [{ name: "raw", axes: "bcyx", data_type: "float32", shape: [1, 1, 256, 256] }],
		outputs: [
			{
				name: "mask",
				axes: "bcyx",
				data_type: "float32",
				shape: { reference_tensor: "raw", scale: [1, 1, 1, 1], offset: [0, 0, 0, 0] },
			},
		],
		test_inputs: ["test_input.npy"],
		test_outputs: ["test_output.npy"],
		weights: { pytorch_state_dict: { source: "weights.pt", architecture: "model.py:UNet" } },
		...overrides,
	};
}

/**
 * A valid dataset description at format version 0.2.4.
 */
export function createDataset(overrides: RawMapping = {}): RawMapping {
	return {
		format_version: "0.2.4",
		type: "dataset",
		name: "Nuclei images",
		description: "Fluorescence images of stained nuclei.",
		...overrides,
	};
}

/** Context options that skip file existence checks. */
export const NO_IO = { root: "/data/unet", performIoChecks: false } as const;
